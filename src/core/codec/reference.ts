import { REF_KEY } from '../constants.js';
import { PayloadMismatchError } from '../errors.js';
import { Codec, JsonValue } from '../types/index.js';
import { isJsonObject, kindOf } from '../utils/index.js';

export interface Reference {
    readonly kind: 'reference';
    /** The `$ref` locator, e.g. `#/components/parameters/limit`. Never resolved here. */
    readonly target: string;
}

export interface Inline<T> {
    readonly kind: 'inline';
    readonly value: T;
}

/**
 * Either an indirection to a shared definition or the definition itself.
 * The variant is chosen once, at decode time, from the shape of the object.
 */
export type ReferenceOr<T> = Reference | Inline<T>;

export const reference = (target: string): Reference => ({ kind: 'reference', target });

export const inline = <T>(value: T): Inline<T> => ({ kind: 'inline', value });

export const isReference = <T>(node: ReferenceOr<T>): node is Reference => node.kind === 'reference';

export const isInline = <T>(node: ReferenceOr<T>): node is Inline<T> => node.kind === 'inline';

/** The inline payload, or `undefined` for a reference. */
export function inlineValue<T>(node: ReferenceOr<T>): T | undefined {
    return node.kind === 'inline' ? node.value : undefined;
}

/** The reference locator, or `undefined` for an inline payload. */
export function referenceTarget<T>(node: ReferenceOr<T>): string | undefined {
    return node.kind === 'reference' ? node.target : undefined;
}

/**
 * Wraps a payload codec so any position may hold `{ "$ref": "..." }` instead.
 *
 * An object is a reference only when `$ref` is its one and only key. An object carrying `$ref`
 * next to other keys is handed to the payload codec like any other inline object.
 */
export function referenceOr<T>(payload: Codec<T>): Codec<ReferenceOr<T>> {
    return {
        kind: `${payload.kind} | Reference`,
        decode(value: JsonValue, pointer = '') {
            if (!isJsonObject(value)) {
                throw new PayloadMismatchError(pointer, `expected an object, found ${kindOf(value)}`);
            }

            const keys = Object.keys(value);
            if (keys.length === 1 && keys[0] === REF_KEY) {
                const target = value[REF_KEY];
                if (typeof target !== 'string') {
                    throw new PayloadMismatchError(pointer, `'${REF_KEY}' must be a string, found ${kindOf(target)}`);
                }
                return reference(target);
            }

            return inline(payload.decode(value, pointer));
        },
        encode(node) {
            if (node.kind === 'reference') {
                return { [REF_KEY]: node.target };
            }
            return payload.encode(node.value);
        },
    };
}
