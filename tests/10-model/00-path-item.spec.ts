import { describe, expect, it } from 'vitest';

import { HTTP_METHODS } from '@src/core/constants.js';
import { inline, reference } from '@src/core/codec/index.js';
import { TypeMismatchError } from '@src/core/errors.js';
import { Operation, PathItem, pathItemCodec } from '@src/core/model/index.js';
import { isJsonObject } from '@src/core/utils/index.js';

import { captureError } from '../shared/helpers.js';

const op = (operationId: string): Operation => ({ operationId, extensions: new Map() });

describe('Model: PathItem', () => {
    it('should list operations in canonical method order regardless of source order', () => {
        const item = pathItemCodec.decode({
            post: { operationId: 'create' },
            get: { operationId: 'list' },
            delete: { operationId: 'remove' },
        });

        expect(item.operations()).toEqual([
            ['get', op('list')],
            ['post', op('create')],
            ['delete', op('remove')],
        ]);
        expect([...item]).toEqual(item.operations());
    });

    it('should expose no operations and encode no method keys when none are present', () => {
        const item = pathItemCodec.decode({ summary: 'Nothing here yet' });

        expect(item.operations()).toEqual([]);
        expect(pathItemCodec.encode(item)).toEqual({ summary: 'Nothing here yet' });
        expect(pathItemCodec.encode(new PathItem())).toEqual({});
    });

    it('should look up a single method', () => {
        const item = new PathItem({ patch: op('update') });
        expect(item.operation('patch')).toEqual(op('update'));
        expect(item.operation('put')).toBeUndefined();
    });

    it('should treat method names case-sensitively and keep unknown ones as extensions', () => {
        const item = pathItemCodec.decode({ GET: { operationId: 'upper' }, query: { operationId: 'q' } });

        expect(item.operations()).toEqual([]);
        expect([...item.extensions.keys()]).toEqual(['GET', 'query']);
    });

    it('should pass extensions through unchanged', () => {
        const source = { 'x-custom': { a: 1 }, get: { operationId: 'list' } };
        const item = pathItemCodec.decode(source);

        expect(item.extensions.get('x-custom')).toEqual({ a: 1 });
        expect(pathItemCodec.encode(item)).toEqual(source);
    });

    it('should not share extension values with the source or the encoded output', () => {
        const source = { 'x-custom': { a: 1 }, get: {} };
        const item = pathItemCodec.decode(source);

        source['x-custom'].a = 999;
        expect(item.extensions.get('x-custom')).toEqual({ a: 1 });

        const encoded = pathItemCodec.encode(item);
        const custom = isJsonObject(encoded) ? encoded['x-custom'] : undefined;
        if (!isJsonObject(custom)) throw new Error('x-custom was not encoded as an object');
        custom.a = 5;
        expect(item.extensions.get('x-custom')).toEqual({ a: 1 });
        expect(pathItemCodec.encode(item)).toEqual({ get: {}, 'x-custom': { a: 1 } });
    });

    it('should encode fixed fields in declaration order followed by extensions', () => {
        const item = pathItemCodec.decode({
            'x-custom': true,
            trace: {},
            parameters: [{ $ref: '#/components/parameters/id' }],
            get: {},
            summary: 's',
        });

        expect(Object.keys(pathItemCodec.encode(item))).toEqual(['summary', 'get', 'trace', 'parameters', 'x-custom']);
    });

    it('should decode shared parameters and servers', () => {
        const item = pathItemCodec.decode({
            servers: [{ url: 'https://api.example.test' }],
            parameters: [{ $ref: '#/components/parameters/id' }, { name: 'q', in: 'query' }],
        });

        expect(item.servers).toEqual([{ url: 'https://api.example.test', extensions: new Map() }]);
        expect(item.parameters).toEqual([
            reference('#/components/parameters/id'),
            inline({ name: 'q', in: 'query', extensions: new Map() }),
        ]);
    });

    it('should replace populated operations and leave absent ones absent', () => {
        const item = new PathItem({ get: op('list'), post: op('create'), summary: 'pets' }, new Map([['x-a', 1]]));
        const visited: string[] = [];

        const renamed = item.mapOperations((method, operation) => {
            visited.push(method);
            return { ...operation, summary: method.toUpperCase() };
        });

        expect(visited).toEqual(['get', 'post']);
        expect(renamed.get?.summary).toBe('GET');
        expect(renamed.post?.summary).toBe('POST');
        expect(renamed.put).toBeUndefined();
        expect(renamed.summary).toBe('pets');
        expect(renamed.extensions.get('x-a')).toBe(1);
        expect(item.get?.summary).toBeUndefined();
        expect(renamed.operations().map(([method]) => method)).toEqual(['get', 'post']);
    });

    it('should accept every method of the canonical order', () => {
        const source = Object.fromEntries([...HTTP_METHODS].reverse().map(method => [method, { operationId: method }]));
        const item = pathItemCodec.decode(source);

        expect(item.operations().map(([method]) => method)).toEqual([...HTTP_METHODS]);
    });

    it('should report the location of a malformed operation', () => {
        const error = captureError(() => pathItemCodec.decode({ get: { operationId: 7 } }, '/paths/~1pets'));

        expect(error).toBeInstanceOf(TypeMismatchError);
        expect(error).toMatchObject({ pointer: '/paths/~1pets/get/operationId', expectedKind: 'string' });
    });
});
