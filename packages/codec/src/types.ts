/**
 * Type definitions for JSON values and the codec boundary
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/**
 * A JSON object. `undefined` members are allowed so optional fields can be
 * typed naturally; they are left out of the serialized form.
 */
export interface JsonObject {
  [key: string]: JsonValue | undefined;
}

/**
 * Serialization and transport encoding used to build and read signing input
 */
export interface Codec {
  /** Deterministic JSON serialization as UTF-8 bytes */
  canonicalize(value: JsonObject): Uint8Array;
  /** Unpadded base64url (RFC 4648 §5) */
  encode(bytes: Uint8Array): string;
  decode(text: string): Uint8Array;
  /** Parse UTF-8 JSON bytes that must hold an object */
  parse(bytes: Uint8Array): JsonObject;
}
