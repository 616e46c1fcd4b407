/** JSON-serializable value carried in message content and metadata. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** String-keyed map of serializable values. */
export type Metadata = Record<string, JsonValue>;

/**
 * A single message passed to or returned from an agent.
 * Frozen once built by `createMessage`.
 */
export interface Message {
  readonly role: string;
  readonly content: JsonValue;
  readonly metadata: Readonly<Metadata>;
  readonly timestamp: Date;
}

export interface MessageInit {
  role: string;
  content: JsonValue;
  metadata?: Metadata;
  timestamp?: Date;
}

/** Build an immutable message. Throws on an empty role. */
export function createMessage(init: MessageInit): Message {
  if (typeof init.role !== 'string' || init.role.length === 0) {
    throw new TypeError('Message role cannot be empty');
  }
  return Object.freeze({
    role: init.role,
    content: init.content,
    metadata: Object.freeze({ ...(init.metadata ?? {}) }),
    timestamp: init.timestamp ?? new Date(),
  });
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isMetadata(value);
    default:
      return false;
  }
}

/** Plain string-keyed object whose values are all JSON values. */
export function isMetadata(value: unknown): value is Metadata {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(isJsonValue);
}
