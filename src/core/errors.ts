// src/core/errors.ts

import { lastSegment } from './utils/pointer.js';

/**
 * Base class of every error raised while decoding a value tree.
 * `pointer` is the RFC 6901 JSON Pointer of the offending value; the empty string is the root.
 */
export class DecodeError extends Error {
    constructor(
        message: string,
        public readonly pointer: string,
    ) {
        super(message);
        this.name = 'DecodeError';
    }
}

/**
 * A fixed field (or any typed value) does not have the shape its codec expects.
 */
export class TypeMismatchError extends DecodeError {
    /** The key holding the offending value, or '' at the document root. */
    public readonly key: string;

    constructor(
        pointer: string,
        public readonly expectedKind: string,
        public readonly actualKind: string,
    ) {
        super(`Expected ${expectedKind} at '${pointer || '/'}' but found ${actualKind}.`, pointer);
        this.name = 'TypeMismatchError';
        this.key = lastSegment(pointer);
    }
}

/**
 * A reference-or-inline value is neither a well-formed reference object nor an object at all.
 */
export class PayloadMismatchError extends DecodeError {
    constructor(
        pointer: string,
        public readonly reason: string,
    ) {
        super(`Invalid reference or inline value at '${pointer || '/'}': ${reason}`, pointer);
        this.name = 'PayloadMismatchError';
    }
}

/**
 * The input tree nests deeper than the loader accepts.
 */
export class DocumentTooDeepError extends DecodeError {
    constructor(
        pointer: string,
        public readonly maxDepth: number,
    ) {
        super(`Document exceeds the maximum nesting depth of ${maxDepth} at '${pointer || '/'}'.`, pointer);
        this.name = 'DocumentTooDeepError';
    }
}

/**
 * The input could not be read or parsed into a value tree.
 */
export class DocumentLoadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DocumentLoadError';
    }
}

/**
 * An extension key does not follow the `x-` naming convention.
 */
export class ExtensionNameError extends Error {
    constructor(
        message: string,
        public readonly pointers: string[],
    ) {
        super(message);
        this.name = 'ExtensionNameError';
    }
}
