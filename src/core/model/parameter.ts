import { fieldsFor, recordCodec, WithExtensions } from '../codec/partitioned.js';
import { booleanCodec, jsonCodec, objectCodec, stringCodec } from '../codec/primitives.js';
import { referenceOr, ReferenceOr } from '../codec/reference.js';
import { Codec, JsonObject, JsonValue } from '../types/index.js';

/** Schema objects are not interpreted, only carried. */
export type Schema = JsonObject;

export const schemaCodec: Codec<Schema> = { ...objectCodec, kind: 'Schema' };

export interface ParameterFields {
    readonly name: string;
    /** `query`, `path`, `header`, `cookie` or `querystring`; not checked here. */
    readonly in: string;
    readonly description?: string;
    readonly required?: boolean;
    readonly deprecated?: boolean;
    readonly allowEmptyValue?: boolean;
    readonly style?: string;
    readonly explode?: boolean;
    readonly allowReserved?: boolean;
    readonly schema?: ReferenceOr<Schema>;
    readonly example?: JsonValue;
    readonly examples?: JsonObject;
    readonly content?: JsonObject;
}

export type Parameter = WithExtensions<ParameterFields>;

const field = fieldsFor<ParameterFields>();

export const parameterCodec: Codec<Parameter> = recordCodec('Parameter', {
    fixed: [
        field.required('name', stringCodec),
        field.required('in', stringCodec),
        field.optional('description', stringCodec),
        field.optional('required', booleanCodec),
        field.optional('deprecated', booleanCodec),
        field.optional('allowEmptyValue', booleanCodec),
        field.optional('style', stringCodec),
        field.optional('explode', booleanCodec),
        field.optional('allowReserved', booleanCodec),
        field.optional('schema', referenceOr(schemaCodec)),
        field.optional('example', jsonCodec),
        field.optional('examples', objectCodec),
        field.optional('content', objectCodec),
    ],
});
