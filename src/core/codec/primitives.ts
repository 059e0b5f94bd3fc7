import { TypeMismatchError } from '../errors.js';
import { Codec, JsonObject, JsonValue } from '../types/index.js';
import { appendPointer, cloneObject, cloneValue, isJsonObject, kindOf, setEntry } from '../utils/index.js';

const scalar = <T extends string | number | boolean>(
    kind: 'string' | 'number' | 'boolean',
    accept: (value: JsonValue) => value is T,
): Codec<T> => ({
    kind,
    decode(value, pointer = '') {
        if (!accept(value)) throw new TypeMismatchError(pointer, kind, kindOf(value));
        return value;
    },
    encode: value => value,
});

export const stringCodec: Codec<string> = scalar('string', (v): v is string => typeof v === 'string');
export const numberCodec: Codec<number> = scalar('number', (v): v is number => typeof v === 'number');
export const booleanCodec: Codec<boolean> = scalar('boolean', (v): v is boolean => typeof v === 'boolean');

/** Any value tree, carried without interpretation. Decode and encode both copy the tree. */
export const jsonCodec: Codec<JsonValue> = {
    kind: 'value',
    decode: value => cloneValue(value),
    encode: value => cloneValue(value),
};

/** Any object, carried without interpretation. */
export const objectCodec: Codec<JsonObject> = {
    kind: 'object',
    decode(value, pointer = '') {
        if (!isJsonObject(value)) throw new TypeMismatchError(pointer, 'object', kindOf(value));
        return cloneObject(value);
    },
    encode: value => cloneObject(value),
};

export function arrayOf<T>(item: Codec<T>): Codec<readonly T[]> {
    return {
        kind: `array<${item.kind}>`,
        decode(value, pointer = '') {
            if (!Array.isArray(value)) throw new TypeMismatchError(pointer, `array<${item.kind}>`, kindOf(value));
            return value.map((entry, index) => item.decode(entry, appendPointer(pointer, index)));
        },
        encode: values => values.map(entry => item.encode(entry)),
    };
}

/**
 * A string-keyed object whose values all share one codec. Entry order is kept.
 */
export function mapOf<T>(item: Codec<T>): Codec<ReadonlyMap<string, T>> {
    return {
        kind: `map<${item.kind}>`,
        decode(value, pointer = '') {
            if (!isJsonObject(value)) throw new TypeMismatchError(pointer, `map<${item.kind}>`, kindOf(value));
            const result = new Map<string, T>();
            for (const [key, entry] of Object.entries(value)) {
                result.set(key, item.decode(entry, appendPointer(pointer, key)));
            }
            return result;
        },
        encode(entries) {
            const result: JsonObject = {};
            for (const [key, entry] of entries) {
                setEntry(result, key, item.encode(entry));
            }
            return result;
        },
    };
}
