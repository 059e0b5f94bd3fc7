import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import yaml from 'js-yaml';

import { DEFAULT_MAX_DEPTH } from '../constants.js';
import { DocumentLoadError } from '../errors.js';
import { documentCodec, OpenApiDocument } from '../model/index.js';
import { JsonValue, LoaderOptions } from '../types/index.js';
import { asJsonValue, isUrl } from '../utils/index.js';
import { validateExtensionNames } from '../validator.js';

export class SpecLoader {
    /**
     * Reads, parses and decodes an OpenAPI document from a local path or URL.
     * `$ref` locators are decoded as-is; nothing is fetched on their behalf.
     */
    public static async load(inputPath: string, options: LoaderOptions = {}): Promise<OpenApiDocument> {
        const tree = await this.loadTree(inputPath, options);
        const document = documentCodec.decode(tree);

        if (options.strictExtensions) {
            validateExtensionNames(document);
        }

        return document;
    }

    /**
     * Reads and parses a JSON or YAML file into a value tree without decoding it.
     */
    public static async loadTree(inputPath: string, options: LoaderOptions = {}): Promise<JsonValue> {
        const content = await this.loadContent(inputPath);
        return this.parseContent(content, inputPath, options.maxDepth ?? DEFAULT_MAX_DEPTH);
    }

    /**
     * Parses JSON or YAML text into a value tree. JSON is read as YAML 1.2 with the JSON schema, so
     * timestamps stay strings and duplicate keys are rejected in both syntaxes.
     */
    public static parseContent(content: string, pathOrUrl: string, maxDepth: number = DEFAULT_MAX_DEPTH): JsonValue {
        let parsed: unknown;
        try {
            parsed = yaml.load(content, { schema: yaml.JSON_SCHEMA, filename: pathOrUrl });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new DocumentLoadError(`Failed to parse content from ${pathOrUrl}. Error: ${message}`);
        }
        return asJsonValue(parsed, maxDepth);
    }

    private static async loadContent(pathOrUrl: string): Promise<string> {
        try {
            if (isUrl(pathOrUrl) && !pathOrUrl.startsWith('file:')) {
                const response = await fetch(pathOrUrl);
                if (!response.ok) throw new Error(`Failed to fetch document from ${pathOrUrl}: ${response.statusText}`);
                return await response.text();
            }
            const filePath = pathOrUrl.startsWith('file:') ? fileURLToPath(pathOrUrl) : path.resolve(process.cwd(), pathOrUrl);
            if (!fs.existsSync(filePath)) throw new Error(`Input file not found at ${filePath}`);
            return fs.readFileSync(filePath, 'utf8');
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            throw new DocumentLoadError(`Failed to read content from "${pathOrUrl}": ${message}`);
        }
    }
}
