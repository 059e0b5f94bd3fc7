import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DocumentLoadError, DocumentTooDeepError, ExtensionNameError } from '@src/core/errors.js';
import { inlineValue, reference } from '@src/core/codec/index.js';
import { SpecLoader } from '@src/core/parser/spec-loader.js';

const PETS_YAML = `openapi: 3.1.0
info:
  title: Pets
  version: 1.0.0
paths:
  /pets:
    post:
      operationId: createPet
    get:
      operationId: listPets
  x-owner: pets-team
`;

describe('Core: SpecLoader', () => {
    let tempDir: string;

    const write = (name: string, content: string): string => {
        const filePath = path.join(tempDir, name);
        fs.writeFileSync(filePath, content, 'utf8');
        return filePath;
    };

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'openapi-model-codec-'));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
        vi.unstubAllGlobals();
    });

    it('should load and decode a YAML document', async () => {
        const document = await SpecLoader.load(write('pets.yaml', PETS_YAML));

        expect(document.openapi).toBe('3.1.0');
        expect(document.info).toEqual({ title: 'Pets', version: '1.0.0' });
        expect(document.paths?.extensions.get('x-owner')).toBe('pets-team');

        const pets = inlineValue(document.paths?.get('/pets') ?? reference('missing'));
        expect(pets?.operations().map(([method]) => method)).toEqual(['get', 'post']);
    });

    it('should load a JSON document and accept file: URLs', async () => {
        const filePath = write('pets.json', JSON.stringify({ openapi: '3.0.3', info: { title: 'Pets', version: '1' } }));

        const document = await SpecLoader.load(pathToFileURL(filePath).href);
        expect(document.openapi).toBe('3.0.3');
        expect(document.paths).toBeUndefined();
    });

    it('should reject YAML with duplicate keys', async () => {
        const filePath = write('dup.yaml', 'openapi: 3.1.0\nopenapi: 3.0.0\n');
        await expect(SpecLoader.load(filePath)).rejects.toThrow('duplicated mapping key');
        await expect(SpecLoader.load(filePath)).rejects.toBeInstanceOf(DocumentLoadError);
    });

    it('should reject JSON with duplicate keys', async () => {
        const filePath = write('dup.json', '{"openapi":"3.1.0","openapi":"3.0.0"}');
        await expect(SpecLoader.load(filePath)).rejects.toThrow('duplicated mapping key');
        await expect(SpecLoader.load(filePath)).rejects.toBeInstanceOf(DocumentLoadError);

        expect(() => SpecLoader.parseContent('{"a": 1, "a": 2}', 'doc.json')).toThrow(DocumentLoadError);
    });

    it('should reject a missing file', async () => {
        await expect(SpecLoader.load(path.join(tempDir, 'absent.json'))).rejects.toThrow('Input file not found');
    });

    it('should reject documents nested deeper than maxDepth', async () => {
        const filePath = write(
            'deep.json',
            JSON.stringify({ openapi: '3.1.0', info: { title: 't', version: '1' }, 'x-deep': { a: { b: { c: 1 } } } }),
        );

        await expect(SpecLoader.load(filePath, { maxDepth: 3 })).rejects.toBeInstanceOf(DocumentTooDeepError);
        await expect(SpecLoader.load(filePath, { maxDepth: 3 })).rejects.toMatchObject({ pointer: '/x-deep/a/b' });
        await expect(SpecLoader.load(filePath, { maxDepth: 4 })).resolves.toMatchObject({ openapi: '3.1.0' });
    });

    it('should enforce extension names only when asked', async () => {
        const filePath = write('loose.yaml', 'openapi: 3.1.0\ninfo: {title: t, version: "1"}\nvendor: acme\n');

        await expect(SpecLoader.load(filePath)).resolves.toMatchObject({ openapi: '3.1.0' });
        await expect(SpecLoader.load(filePath, { strictExtensions: true })).rejects.toBeInstanceOf(ExtensionNameError);
    });

    describe('parseContent', () => {
        it('should parse JSON and YAML text', () => {
            expect(SpecLoader.parseContent('{"a": 1}', 'inline')).toEqual({ a: 1 });
            expect(SpecLoader.parseContent('{"a":{"b":[1,"x"]}}', 'doc.json')).toEqual({ a: { b: [1, 'x'] } });
            expect(SpecLoader.parseContent('a: 1', 'inline')).toEqual({ a: 1 });
            expect(SpecLoader.parseContent('created: 2024-01-01', 'doc.yml')).toEqual({ created: '2024-01-01' });
        });

        it('should wrap parser errors', () => {
            expect(() => SpecLoader.parseContent('{bad', 'doc.json')).toThrow(DocumentLoadError);
            expect(() => SpecLoader.parseContent('{bad', 'doc.json')).toThrow('Failed to parse content from doc.json');
        });
    });

    describe('remote documents', () => {
        it('should fetch a URL', async () => {
            const fetchMock = vi.fn().mockResolvedValue({
                ok: true,
                statusText: 'OK',
                text: () => Promise.resolve('{"openapi": "3.0.3", "info": {"title": "t", "version": "1"}}'),
            });
            vi.stubGlobal('fetch', fetchMock);

            const document = await SpecLoader.load('https://example.test/openapi.json');
            expect(document.openapi).toBe('3.0.3');
            expect(fetchMock).toHaveBeenCalledWith('https://example.test/openapi.json');
        });

        it('should report a failed fetch', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, statusText: 'Not Found' }));

            await expect(SpecLoader.load('https://example.test/missing.json')).rejects.toThrow(
                'Failed to fetch document from https://example.test/missing.json: Not Found',
            );
        });
    });
});
