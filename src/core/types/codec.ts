import { JsonValue } from './value.js';

/**
 * A pair of pure functions moving a typed payload to and from the generic value tree.
 *
 * `decode` receives the JSON Pointer of the value so errors can name the exact location.
 */
export interface Codec<T> {
    /** Human readable name of the expected shape, e.g. `string` or `Operation`. */
    readonly kind: string;
    decode(value: JsonValue, pointer?: string): T;
    encode(value: T): JsonValue;
}

/** Decides whether a non-fixed key belongs to a record's dynamic sub-collection. */
export type KeyPredicate = (key: string) => boolean;
