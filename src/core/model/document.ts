import { fieldsFor, recordCodec, WithExtensions } from '../codec/partitioned.js';
import { arrayOf, mapOf, objectCodec, stringCodec } from '../codec/primitives.js';
import { referenceOr, ReferenceOr } from '../codec/reference.js';
import { Codec, JsonObject } from '../types/index.js';
import { PathItem, pathItemCodec } from './path-item.js';
import { Paths, pathsCodec } from './paths.js';
import { Server, serverCodec } from './server.js';

export interface OpenApiDocumentFields {
    /** The OpenAPI version string, e.g. `3.1.0`. */
    readonly openapi: string;
    readonly info: JsonObject;
    readonly jsonSchemaDialect?: string;
    readonly servers?: readonly Server[];
    readonly paths?: Paths;
    /** Incoming requests the API consumer may receive, keyed by a unique name. */
    readonly webhooks?: ReadonlyMap<string, ReferenceOr<PathItem>>;
    readonly components?: JsonObject;
    readonly security?: readonly JsonObject[];
    readonly tags?: readonly JsonObject[];
    readonly externalDocs?: JsonObject;
}

export type OpenApiDocument = WithExtensions<OpenApiDocumentFields>;

const field = fieldsFor<OpenApiDocumentFields>();

export const documentCodec: Codec<OpenApiDocument> = recordCodec('OpenAPI document', {
    fixed: [
        field.required('openapi', stringCodec),
        field.required('info', objectCodec),
        field.optional('jsonSchemaDialect', stringCodec),
        field.optional('servers', arrayOf(serverCodec)),
        field.optional('paths', pathsCodec),
        field.optional('webhooks', mapOf(referenceOr(pathItemCodec))),
        field.optional('components', objectCodec),
        field.optional('security', arrayOf(objectCodec)),
        field.optional('tags', arrayOf(objectCodec)),
        field.optional('externalDocs', objectCodec),
    ],
});
