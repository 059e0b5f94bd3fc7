import * as fs from 'node:fs';
import * as path from 'node:path';

import yaml from 'js-yaml';

import { documentCodec, OpenApiDocument } from '../core/model/index.js';
import { SpecLoader } from '../core/parser/spec-loader.js';
import { CliConfig, JsonValue, OutputFormat } from '../core/types/index.js';

/**
 * One line per populated operation, in path order and then canonical method order.
 * A path held by reference is listed with its target instead.
 */
export function describeOperations(document: OpenApiDocument): string[] {
    const lines: string[] = [];
    for (const [pathTemplate, node] of document.paths ?? []) {
        if (node.kind === 'reference') {
            lines.push(`${pathTemplate} -> ${node.target}`);
            continue;
        }
        for (const [method, operation] of node.value) {
            const id = operation.operationId ? ` (${operation.operationId})` : '';
            lines.push(`${method.toUpperCase()} ${pathTemplate}${id}`);
        }
    }
    return lines;
}

export function serialize(tree: JsonValue, format: OutputFormat): string {
    if (format === 'yaml') {
        return yaml.dump(tree, { indent: 2, noRefs: true, lineWidth: -1 });
    }
    return `${JSON.stringify(tree, null, 2)}\n`;
}

export async function runInspect(config: CliConfig): Promise<void> {
    const document = await SpecLoader.load(config.input, config.options);
    const lines = describeOperations(document);
    if (lines.length === 0) {
        console.log('No operations found.');
        return;
    }
    lines.forEach(line => console.log(line));
}

/**
 * Decodes the input document and writes its re-encoded form.
 * @returns The serialized document.
 */
export async function runRoundtrip(config: CliConfig): Promise<string> {
    const document = await SpecLoader.load(config.input, config.options);
    const text = serialize(documentCodec.encode(document), config.format ?? 'json');

    if (config.output) {
        fs.mkdirSync(path.dirname(config.output), { recursive: true });
        fs.writeFileSync(config.output, text, 'utf8');
        console.log(`✅ Wrote ${config.output}`);
    } else {
        process.stdout.write(text);
    }
    return text;
}
