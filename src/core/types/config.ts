/** Options applied while turning raw input into a decoded document. */
export interface LoaderOptions {
    /**
     * Maximum nesting depth accepted from the parsed input. The decoder recurses once per level,
     * so the loader rejects deeper trees before decoding starts.
     * @default 256
     */
    maxDepth?: number;
    /** If true, every extension key on every decoded record must start with `x-`. */
    strictExtensions?: boolean;
}

/** Output syntax for re-encoded documents. */
export type OutputFormat = 'json' | 'yaml';

/** The resolved configuration of a CLI run. */
export interface CliConfig {
    /** The local file path or remote URL of the OpenAPI document. */
    input: string;
    /** Where `roundtrip` writes its result. Standard output when absent. */
    output?: string;
    /** @default 'yaml' for `.yaml`/`.yml` inputs, otherwise 'json' */
    format?: OutputFormat;
    options: LoaderOptions;
}
