import { PATH_PREFIX } from '../constants.js';
import { decodePartitioned, encodePartitioned, Extensions, PartitionLayout } from '../codec/partitioned.js';
import { referenceOr, ReferenceOr } from '../codec/reference.js';
import { Codec } from '../types/index.js';
import { PathItem, pathItemCodec } from './path-item.js';

/** True for keys of the path collection that are path templates, e.g. `/pets/{petId}`. */
export const isPathTemplate = (key: string): boolean => key.startsWith(PATH_PREFIX);

export type PathEntry = [pathTemplate: string, item: ReferenceOr<PathItem>];

/**
 * The relative paths of the API and the operations on each, in document order.
 */
export class Paths implements Iterable<PathEntry> {
    private readonly items: ReadonlyMap<string, ReferenceOr<PathItem>>;
    public readonly extensions: Extensions;

    public constructor(
        items: Iterable<PathEntry> = [],
        extensions: Extensions = new Map(),
    ) {
        this.items = new Map(items);
        this.extensions = new Map(extensions);
    }

    public get size(): number {
        return this.items.size;
    }

    /** Looks up a path by its exact template string. */
    public get(pathTemplate: string): ReferenceOr<PathItem> | undefined {
        return this.items.get(pathTemplate);
    }

    public has(pathTemplate: string): boolean {
        return this.items.has(pathTemplate);
    }

    public keys(): IterableIterator<string> {
        return this.items.keys();
    }

    public entries(): IterableIterator<PathEntry> {
        return this.items.entries();
    }

    public [Symbol.iterator](): IterableIterator<PathEntry> {
        return this.entries();
    }
}

const PATHS_LAYOUT: PartitionLayout<object, ReferenceOr<PathItem>> = {
    fixed: [],
    dynamic: { matches: isPathTemplate, codec: referenceOr(pathItemCodec) },
};

export const pathsCodec: Codec<Paths> = {
    kind: 'Paths',
    decode(value, pointer = '') {
        const { dynamic, extensions } = decodePartitioned(value, PATHS_LAYOUT, pointer);
        return new Paths(dynamic, extensions);
    },
    encode: paths => encodePartitioned({ fixed: {}, dynamic: new Map(paths), extensions: paths.extensions }, PATHS_LAYOUT),
};
