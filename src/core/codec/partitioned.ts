/**
 * @fileoverview
 * Splits an object into three buckets in a single pass over its keys:
 *
 * 1. fixed fields, declared by name and decoded with their own codec;
 * 2. dynamic entries, whose keys match the layout's predicate;
 * 3. extensions, everything else, kept as raw value trees (copied, never shared with the source).
 *
 * Every source key lands in exactly one bucket. Encoding writes the buckets back in that order.
 */

import { TypeMismatchError } from '../errors.js';
import { Codec, JsonObject, JsonValue, KeyPredicate } from '../types/index.js';
import { appendPointer, cloneValue, isJsonObject, kindOf, setEntry } from '../utils/index.js';

/**
 * One reserved key of a record type `F`. Built with {@link fieldsFor}.
 */
export interface FixedField<F> {
    readonly name: string;
    readonly required: boolean;
    readonly kind: string;
    decodeInto(target: Draft<F>, value: JsonValue, pointer: string): void;
    /** Returns `undefined` when the field is absent. */
    encodeFrom(source: F): JsonValue | undefined;
}

/** The mutable, all-optional record the decoder fills while walking the source keys. */
export type Draft<F> = { -readonly [K in keyof F]?: F[K] };

type OptionalKeys<F> = { [K in keyof F]-?: {} extends Pick<F, K> ? K : never }[keyof F] & string;

type RequiredKeys<F> = Exclude<keyof F & string, OptionalKeys<F>>;

/** Extension entries, keyed by their original string in source order. */
export type Extensions = ReadonlyMap<string, JsonValue>;

/** A record type `F` carrying its own extension entries. */
export type WithExtensions<F> = F & { readonly extensions: Extensions };

export interface DynamicEntries<D> {
    readonly matches: KeyPredicate;
    readonly codec: Codec<D>;
}

/**
 * Describes how the keys of one record type are routed.
 * Without `dynamic`, no key is dynamic and every unrecognized key is an extension.
 */
export interface PartitionLayout<F, D = never> {
    readonly fixed: readonly FixedField<F>[];
    readonly dynamic?: DynamicEntries<D>;
}

export interface Partitioned<F, D = never> {
    readonly fixed: F;
    readonly dynamic: ReadonlyMap<string, D>;
    readonly extensions: Extensions;
}

function isPresent<T>(value: T): value is NonNullable<T> {
    return value !== undefined && value !== null;
}

function assertRequiredFields<F>(
    draft: Draft<F>,
    fields: readonly FixedField<F>[],
    pointer: string,
): asserts draft is F & Draft<F> {
    for (const field of fields) {
        if (field.required && !Object.prototype.hasOwnProperty.call(draft, field.name)) {
            throw new TypeMismatchError(appendPointer(pointer, field.name), field.kind, 'undefined');
        }
    }
}

/**
 * Returns typed builders for the fixed fields of record type `F`.
 *
 * @example
 * const fields = fieldsFor<ServerFields>();
 * const layout = { fixed: [fields.required('url', stringCodec), fields.optional('description', stringCodec)] };
 */
export function fieldsFor<F extends object>() {
    const build = <K extends keyof F & string>(
        name: K,
        codec: Codec<NonNullable<F[K]>>,
        required: boolean,
    ): FixedField<F> => ({
        name,
        required,
        kind: codec.kind,
        decodeInto(target, value, pointer) {
            target[name] = codec.decode(value, pointer);
        },
        encodeFrom(source) {
            const current = source[name];
            return isPresent(current) ? codec.encode(current) : undefined;
        },
    });

    return {
        optional: <K extends OptionalKeys<F>>(name: K, codec: Codec<NonNullable<F[K]>>) => build(name, codec, false),
        required: <K extends RequiredKeys<F>>(name: K, codec: Codec<NonNullable<F[K]>>) => build(name, codec, true),
    };
}

/**
 * Routes every key of `value` to exactly one bucket of the layout.
 *
 * @throws {TypeMismatchError} if `value` is not an object, or a fixed field is missing or malformed.
 * Errors raised by a field or dynamic codec propagate unchanged.
 */
export function decodePartitioned<F, D = never>(
    value: JsonValue,
    layout: PartitionLayout<F, D>,
    pointer: string = '',
): Partitioned<F, D> {
    if (!isJsonObject(value)) {
        throw new TypeMismatchError(pointer, 'object', kindOf(value));
    }

    const fixedByName = new Map(layout.fixed.map(field => [field.name, field]));
    const fixed: Draft<F> = {};
    const dynamic = new Map<string, D>();
    const extensions = new Map<string, JsonValue>();

    for (const [key, entry] of Object.entries(value)) {
        const entryPointer = appendPointer(pointer, key);
        const field = fixedByName.get(key);

        if (field) {
            // null on an optional field means "absent"
            if (entry === null && !field.required) continue;
            if (entry === null) throw new TypeMismatchError(entryPointer, field.kind, 'null');
            field.decodeInto(fixed, entry, entryPointer);
        } else if (layout.dynamic?.matches(key)) {
            dynamic.set(key, layout.dynamic.codec.decode(entry, entryPointer));
        } else {
            extensions.set(key, cloneValue(entry));
        }
    }

    assertRequiredFields(fixed, layout.fixed, pointer);

    return { fixed, dynamic, extensions };
}

/**
 * Reassembles the buckets: fixed fields in declaration order, then dynamic entries, then extensions.
 * Absent optional fields are left out rather than written as `null`.
 */
export function encodePartitioned<F, D = never>(
    parts: { readonly fixed: F; readonly dynamic?: ReadonlyMap<string, D>; readonly extensions: Extensions },
    layout: PartitionLayout<F, D>,
): JsonObject {
    const result: JsonObject = {};

    for (const field of layout.fixed) {
        const encoded = field.encodeFrom(parts.fixed);
        if (encoded !== undefined) setEntry(result, field.name, encoded);
    }

    if (layout.dynamic && parts.dynamic) {
        for (const [key, entry] of parts.dynamic) {
            setEntry(result, key, layout.dynamic.codec.encode(entry));
        }
    }

    for (const [key, entry] of parts.extensions) {
        setEntry(result, key, cloneValue(entry));
    }

    return result;
}

/**
 * A codec for a record with fixed fields and extensions but no dynamic keys.
 */
export function recordCodec<F extends object>(kind: string, layout: PartitionLayout<F>): Codec<WithExtensions<F>> {
    return {
        kind,
        decode(value, pointer = '') {
            const { fixed, extensions } = decodePartitioned(value, layout, pointer);
            return { ...fixed, extensions };
        },
        encode: record => encodePartitioned({ fixed: record, extensions: record.extensions }, layout),
    };
}
