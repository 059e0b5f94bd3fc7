import * as fs from 'node:fs';

import { createProgram } from './cli/program.js';

const packageJsonPath = new URL('../package.json', import.meta.url);
const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
const version =
    typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
        ? packageJson.version
        : '0.0.0';

await createProgram(version).parseAsync(process.argv);
