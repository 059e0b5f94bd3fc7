import { DocumentTooDeepError, TypeMismatchError } from '../errors.js';
import { JsonObject, JsonValue, ValueKind } from '../types/index.js';
import { DEFAULT_MAX_DEPTH } from '../constants.js';
import { appendPointer } from './pointer.js';

/**
 * Names the shape of a value for error messages.
 */
export function kindOf(value: unknown): ValueKind {
    if (value === undefined) return 'undefined';
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    switch (typeof value) {
        case 'string':
            return 'string';
        case 'number':
            return 'number';
        case 'boolean':
            return 'boolean';
        default:
            return 'object';
    }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Writes an own enumerable entry. A literal `__proto__` key stays data instead of replacing the prototype.
 */
export function setEntry(target: JsonObject, key: string, value: JsonValue): void {
    if (key === '__proto__') {
        Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
        return;
    }
    target[key] = value;
}

/** Deep-copies an object tree. A literal `__proto__` key is copied as data. */
export function cloneObject(value: JsonObject): JsonObject {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
        setEntry(result, key, cloneValue(item));
    }
    return result;
}

export function cloneValue(value: JsonValue): JsonValue {
    if (Array.isArray(value)) return value.map(cloneValue);
    if (isJsonObject(value)) return cloneObject(value);
    return value;
}

/**
 * Converts the output of a JSON/YAML parser into a `JsonValue` tree, rejecting anything JSON cannot carry
 * and any nesting deeper than `maxDepth`.
 */
export function asJsonValue(input: unknown, maxDepth: number = DEFAULT_MAX_DEPTH): JsonValue {
    const convert = (value: unknown, pointer: string, depth: number): JsonValue => {
        if (value === null || typeof value === 'string' || typeof value === 'boolean') {
            return value;
        }
        if (typeof value === 'number') {
            if (!Number.isFinite(value)) throw new TypeMismatchError(pointer, 'finite number', String(value));
            return value;
        }
        if (typeof value !== 'object') {
            throw new TypeMismatchError(pointer, 'JSON value', typeof value);
        }
        if (depth >= maxDepth) {
            throw new DocumentTooDeepError(pointer, maxDepth);
        }
        if (Array.isArray(value)) {
            return value.map((item, index) => convert(item, appendPointer(pointer, index), depth + 1));
        }
        const prototype = Object.getPrototypeOf(value);
        if (prototype !== Object.prototype && prototype !== null) {
            throw new TypeMismatchError(pointer, 'JSON value', value.constructor.name);
        }
        const result: JsonObject = {};
        for (const [key, item] of Object.entries(value)) {
            setEntry(result, key, convert(item, appendPointer(pointer, key), depth + 1));
        }
        return result;
    };

    return convert(input, '', 0);
}
