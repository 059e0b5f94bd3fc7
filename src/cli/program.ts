import { Command, InvalidArgumentError, Option } from 'commander';

import { CommandOptions, resolveConfig } from './config.js';
import { runInspect, runRoundtrip } from './commands.js';
import { CliConfig } from '../core/types/index.js';

function parsePositiveInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function withSharedOptions(command: Command): Command {
    return command
        .option('-c, --config <path>', 'Path to a JSON or YAML configuration file')
        .option('-i, --input <path>', 'Path or URL to the OpenAPI document (overrides config)')
        .option('--max-depth <n>', 'Reject documents nested deeper than this', parsePositiveInteger)
        .option('--strict-extensions', "Require every extension key to start with 'x-'");
}

function action(run: (config: CliConfig) => Promise<unknown>) {
    return async (options: CommandOptions): Promise<void> => {
        try {
            await run(await resolveConfig(options));
        } catch (error) {
            console.error('❌', error instanceof Error ? error.message : String(error));
            process.exitCode = 1;
        }
    };
}

export function createProgram(version: string): Command {
    const program = new Command();
    program
        .name('openapi-model-codec')
        .description('Decode OpenAPI documents into a typed model and encode them back')
        .version(version);

    withSharedOptions(program.command('inspect'))
        .description('List the operations of every path in the document')
        .action(action(runInspect));

    withSharedOptions(program.command('roundtrip'))
        .description('Decode the document and write its re-encoded form')
        .option('-o, --output <path>', 'Output file (defaults to standard output)')
        .addOption(new Option('--format <format>', 'Output syntax').choices(['json', 'yaml']))
        .action(action(runRoundtrip));

    return program;
}
