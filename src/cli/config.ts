import * as path from 'node:path';

import { fieldsFor, recordCodec } from '../core/codec/partitioned.js';
import { booleanCodec, stringCodec } from '../core/codec/primitives.js';
import { TypeMismatchError } from '../core/errors.js';
import { SpecLoader } from '../core/parser/spec-loader.js';
import { CliConfig, Codec, OutputFormat } from '../core/types/index.js';
import { isUrl, kindOf } from '../core/utils/index.js';

/** Options shared by every command, as parsed by commander. */
export interface CommandOptions {
    config?: string;
    input?: string;
    output?: string;
    format?: OutputFormat;
    maxDepth?: number;
    strictExtensions?: boolean;
}

interface ConfigFileFields {
    readonly input?: string;
    readonly output?: string;
    readonly format?: OutputFormat;
    readonly maxDepth?: number;
    readonly strictExtensions?: boolean;
}

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml'];

const isOutputFormat = (value: unknown): value is OutputFormat => OUTPUT_FORMATS.some(format => format === value);

const formatCodec: Codec<OutputFormat> = {
    kind: `'json' | 'yaml'`,
    decode(value, pointer = '') {
        if (!isOutputFormat(value)) throw new TypeMismatchError(pointer, `'json' | 'yaml'`, kindOf(value));
        return value;
    },
    encode: value => value,
};

const positiveIntegerCodec: Codec<number> = {
    kind: 'positive integer',
    decode(value, pointer = '') {
        if (typeof value !== 'number') throw new TypeMismatchError(pointer, 'positive integer', kindOf(value));
        if (!Number.isInteger(value) || value <= 0) throw new TypeMismatchError(pointer, 'positive integer', String(value));
        return value;
    },
    encode: value => value,
};

const field = fieldsFor<ConfigFileFields>();

const configFileCodec = recordCodec('configuration file', {
    fixed: [
        field.optional('input', stringCodec),
        field.optional('output', stringCodec),
        field.optional('format', formatCodec),
        field.optional('maxDepth', positiveIntegerCodec),
        field.optional('strictExtensions', booleanCodec),
    ],
});

/**
 * Loads a JSON or YAML configuration file. Relative `input` and `output` paths are resolved
 * against the directory of the file.
 */
export async function loadConfigFile(configPath: string): Promise<ConfigFileFields> {
    const resolvedPath = path.resolve(process.cwd(), configPath);
    const tree = await SpecLoader.loadTree(resolvedPath);
    const { extensions, ...config } = configFileCodec.decode(tree);

    for (const key of extensions.keys()) {
        console.warn(`[Config] Ignoring unknown configuration key "${key}" in ${resolvedPath}.`);
    }

    const configDir = path.dirname(resolvedPath);
    return {
        ...config,
        input: config.input && !isUrl(config.input) ? path.resolve(configDir, config.input) : config.input,
        output: config.output ? path.resolve(configDir, config.output) : undefined,
    };
}

function inferFormat(input: string, output?: string): OutputFormat {
    const source = output ?? input;
    return ['.yaml', '.yml'].includes(path.extname(source).toLowerCase()) ? 'yaml' : 'json';
}

/**
 * Merges command line flags over a configuration file over defaults.
 */
export async function resolveConfig(options: CommandOptions): Promise<CliConfig> {
    const base: ConfigFileFields = options.config ? await loadConfigFile(options.config) : {};

    const input = options.input ?? base.input;
    if (!input) {
        throw new Error('Input path or URL is required. Provide it via --input or a config file.');
    }

    const output = options.output ?? base.output;
    return {
        input,
        output,
        format: options.format ?? base.format ?? inferFormat(input, output),
        options: {
            maxDepth: options.maxDepth ?? base.maxDepth,
            strictExtensions: options.strictExtensions ?? base.strictExtensions ?? false,
        },
    };
}
