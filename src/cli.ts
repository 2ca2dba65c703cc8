#!/usr/bin/env node
/**
 * strict-ops CLI - Evaluate operator applications under the strict rules
 *
 * Usage:
 *   strict-ops eval '<=>' 1 2.5
 *   strict-ops table '.'
 *   strict-ops --help
 */

import { executeCommand, parseArgs } from './cli-commands.js';
import { formatError } from './cli-shared.js';
import { loadConfig } from './config.js';

/**
 * Entry point for strict-ops binary
 */
function main(): void {
  try {
    const command = parseArgs(process.argv.slice(2));
    const config = loadConfig(process.cwd());
    const result = executeCommand(command, config);

    for (const line of result.stderr) console.error(line);
    for (const line of result.stdout) console.log(line);
    process.exitCode = result.code;
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    process.exitCode = 1;
  }
}

main();
