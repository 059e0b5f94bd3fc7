// ===================================================================================
// Generic Value Tree
// ===================================================================================

export type JsonPrimitive = string | number | boolean | null;

/**
 * A value as produced by a JSON or YAML parser: the substrate every codec reads and writes.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/**
 * A string-keyed object. Keys are unique and iteration order is insertion order, except that
 * integer-like keys such as `"404"` are enumerated first, in ascending numeric order.
 */
export interface JsonObject {
    [key: string]: JsonValue;
}

/** The shape names reported in decode errors. */
export type ValueKind = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null' | 'undefined';
