/**
 * Untyped JSON tree produced by the response extractor, before schema validation.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };
