import { fieldsFor, recordCodec, WithExtensions } from '../codec/partitioned.js';
import { arrayOf, booleanCodec, objectCodec, stringCodec } from '../codec/primitives.js';
import { referenceOr, ReferenceOr } from '../codec/reference.js';
import { Codec, JsonObject } from '../types/index.js';
import { Parameter, parameterCodec } from './parameter.js';
import { Server, serverCodec } from './server.js';

export interface OperationFields {
    readonly tags?: readonly string[];
    readonly summary?: string;
    readonly description?: string;
    readonly externalDocs?: JsonObject;
    readonly operationId?: string;
    readonly parameters?: readonly ReferenceOr<Parameter>[];
    readonly requestBody?: ReferenceOr<JsonObject>;
    /** Response objects keyed by status code, carried as-is. */
    readonly responses?: JsonObject;
    readonly callbacks?: JsonObject;
    readonly deprecated?: boolean;
    readonly security?: readonly JsonObject[];
    readonly servers?: readonly Server[];
}

/** A single API operation on a path. */
export type Operation = WithExtensions<OperationFields>;

const field = fieldsFor<OperationFields>();

export const operationCodec: Codec<Operation> = recordCodec('Operation', {
    fixed: [
        field.optional('tags', arrayOf(stringCodec)),
        field.optional('summary', stringCodec),
        field.optional('description', stringCodec),
        field.optional('externalDocs', objectCodec),
        field.optional('operationId', stringCodec),
        field.optional('parameters', arrayOf(referenceOr(parameterCodec))),
        field.optional('requestBody', referenceOr(objectCodec)),
        field.optional('responses', objectCodec),
        field.optional('callbacks', objectCodec),
        field.optional('deprecated', booleanCodec),
        field.optional('security', arrayOf(objectCodec)),
        field.optional('servers', arrayOf(serverCodec)),
    ],
});
