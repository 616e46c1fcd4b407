export { bootstrap } from './bootstrap.js';
export type { BootstrapOptions, AppServer } from './bootstrap.js';
