import { HTTP_METHODS, HttpMethod } from '../constants.js';
import { decodePartitioned, encodePartitioned, Extensions, fieldsFor, PartitionLayout } from '../codec/partitioned.js';
import { arrayOf, stringCodec } from '../codec/primitives.js';
import { referenceOr, ReferenceOr } from '../codec/reference.js';
import { Codec } from '../types/index.js';
import { Operation, operationCodec } from './operation.js';
import { Parameter, parameterCodec } from './parameter.js';
import { Server, serverCodec } from './server.js';

export interface PathItemFields {
    readonly summary?: string;
    readonly description?: string;
    readonly get?: Operation;
    readonly put?: Operation;
    readonly post?: Operation;
    readonly delete?: Operation;
    readonly options?: Operation;
    readonly head?: Operation;
    readonly patch?: Operation;
    readonly trace?: Operation;
    /** An alternative server list for every operation on this path. */
    readonly servers?: readonly Server[];
    /** Parameters shared by every operation on this path. */
    readonly parameters?: readonly ReferenceOr<Parameter>[];
}

type MutablePathItemFields = { -readonly [K in keyof PathItemFields]: PathItemFields[K] };

/** A populated operation slot. */
export type MethodOperation = [method: HttpMethod, operation: Operation];

/**
 * The operations available on a single path.
 *
 * A method with no operation is not offered on the path; an empty Path Item is valid and exposes
 * no operations at all.
 */
export class PathItem implements PathItemFields {
    public readonly summary?: string;
    public readonly description?: string;
    public readonly get?: Operation;
    public readonly put?: Operation;
    public readonly post?: Operation;
    public readonly delete?: Operation;
    public readonly options?: Operation;
    public readonly head?: Operation;
    public readonly patch?: Operation;
    public readonly trace?: Operation;
    public readonly servers?: readonly Server[];
    public readonly parameters?: readonly ReferenceOr<Parameter>[];
    public readonly extensions: Extensions;

    public constructor(fields: PathItemFields = {}, extensions: Extensions = new Map()) {
        this.summary = fields.summary;
        this.description = fields.description;
        this.get = fields.get;
        this.put = fields.put;
        this.post = fields.post;
        this.delete = fields.delete;
        this.options = fields.options;
        this.head = fields.head;
        this.patch = fields.patch;
        this.trace = fields.trace;
        this.servers = fields.servers;
        this.parameters = fields.parameters;
        this.extensions = new Map(extensions);
    }

    public operation(method: HttpMethod): Operation | undefined {
        return this[method];
    }

    /**
     * The populated operations in canonical method order (get, put, post, delete, options, head,
     * patch, trace), whatever order the source document used.
     */
    public operations(): MethodOperation[] {
        return Array.from(this);
    }

    public *[Symbol.iterator](): IterableIterator<MethodOperation> {
        for (const method of HTTP_METHODS) {
            const operation: Operation | undefined = this[method];
            if (operation) yield [method, operation];
        }
    }

    /**
     * Returns a copy in which every populated operation is replaced by `fn(method, operation)`.
     * Methods without an operation stay absent.
     */
    public mapOperations(fn: (method: HttpMethod, operation: Operation) => Operation): PathItem {
        const next: MutablePathItemFields = this.toFields();
        for (const [method, operation] of this) {
            next[method] = fn(method, operation);
        }
        return new PathItem(next, this.extensions);
    }

    private toFields(): PathItemFields {
        return {
            summary: this.summary,
            description: this.description,
            get: this.get,
            put: this.put,
            post: this.post,
            delete: this.delete,
            options: this.options,
            head: this.head,
            patch: this.patch,
            trace: this.trace,
            servers: this.servers,
            parameters: this.parameters,
        };
    }
}

const field = fieldsFor<PathItemFields>();

const PATH_ITEM_LAYOUT: PartitionLayout<PathItemFields> = {
    fixed: [
        field.optional('summary', stringCodec),
        field.optional('description', stringCodec),
        ...HTTP_METHODS.map(method => field.optional(method, operationCodec)),
        field.optional('servers', arrayOf(serverCodec)),
        field.optional('parameters', arrayOf(referenceOr(parameterCodec))),
    ],
};

export const pathItemCodec: Codec<PathItem> = {
    kind: 'PathItem',
    decode(value, pointer = '') {
        const { fixed, extensions } = decodePartitioned(value, PATH_ITEM_LAYOUT, pointer);
        return new PathItem(fixed, extensions);
    },
    encode: item => encodePartitioned({ fixed: item, extensions: item.extensions }, PATH_ITEM_LAYOUT),
};
