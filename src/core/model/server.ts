import { fieldsFor, recordCodec, WithExtensions } from '../codec/partitioned.js';
import { objectCodec, stringCodec } from '../codec/primitives.js';
import { Codec, JsonObject } from '../types/index.js';

export interface ServerFields {
    readonly url: string;
    readonly description?: string;
    readonly name?: string;
    /** Server variable objects, carried as-is. */
    readonly variables?: JsonObject;
}

export type Server = WithExtensions<ServerFields>;

const field = fieldsFor<ServerFields>();

export const serverCodec: Codec<Server> = recordCodec('Server', {
    fixed: [
        field.required('url', stringCodec),
        field.optional('description', stringCodec),
        field.optional('name', stringCodec),
        field.optional('variables', objectCodec),
    ],
});
