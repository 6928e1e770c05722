/**
 * Strict JSON-serializable value type.
 * Unknown fields carried through a persisted message must stay within it so
 * they can be written back unchanged.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };
