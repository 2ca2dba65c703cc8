/**
 * CLI Commands
 * Argument parsing and command execution for strict-ops
 */

import { readFileSync } from 'node:fs';
import type { CliConfig } from './config.js';
import { explainError, listErrors } from './cli-explain.js';
import {
  formatError,
  formatOutput,
  formatRuleEvent,
  parseOperand,
  renderRuleTable,
} from './cli-shared.js';
import {
  createEngineContext,
  evaluateOperator,
  selectCase,
} from './runtime/index.js';
import type { CaseLabel, ObservabilityCallbacks } from './runtime/index.js';
import { EngineError, InternalError, isOperator } from './types.js';
import type { EvaluationMode, Operator } from './types.js';

// ============================================================
// COMMANDS
// ============================================================

/** Parsed command line */
export type CliCommand =
  | { mode: 'help' | 'version' }
  | {
      mode: 'eval';
      operator: Operator;
      operands: string[];
      evaluation: EvaluationMode;
    }
  | { mode: 'match'; subject: string; labels: string[] }
  | { mode: 'table'; operator: Operator; evaluation: EvaluationMode }
  | { mode: 'explain'; errorId: string | undefined };

/** Lines to print and the process exit code */
export interface CommandResult {
  code: number;
  stdout: string[];
  stderr: string[];
}

const HELP_TEXT = `Strict Operator Engine

Usage:
  strict-ops eval <op> <operand> [operand]   Evaluate an operator application
  strict-ops match <subject> <label>...      Pick the switch case for a subject
  strict-ops table <op>                      Print the rule table of an operator
  strict-ops explain [error-id]              Document an error, or list them all
  strict-ops --help                          Show this help message
  strict-ops --version                       Show version information

Options:
  --weak    Evaluate in weak mode (eval, table)

Operands are YAML flow literals. A label spelled default is the default branch.

Examples:
  strict-ops eval '>' 1.5 1
  strict-ops eval . 'abc' 1.0
  strict-ops match 0 '"0"' default
  strict-ops table '+'
  strict-ops explain OPS-T002`;

/** Flags that start with -- and a letter; a bare -- is the decrement operator */
const FLAG_PATTERN = /^--[a-z]/;

function readOperator(symbol: string): Operator {
  if (!isOperator(symbol)) {
    throw new InternalError('OPS-I003', { operator: symbol });
  }
  return symbol;
}

/**
 * Parse command-line arguments into structured command
 *
 * @throws Error for unknown options, unknown commands and missing arguments
 * @throws InternalError (OPS-I003) for unknown operator symbols
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  // Check for --help and --version in any position
  if (argv.includes('--help')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  for (const arg of argv) {
    if (FLAG_PATTERN.test(arg) && arg !== '--weak') {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  const evaluation: EvaluationMode = argv.includes('--weak')
    ? 'weak'
    : 'strict';
  const [command, ...rest] = argv.filter((arg) => arg !== '--weak');

  // If no arguments, default to help
  if (command === undefined) {
    return { mode: 'help' };
  }

  switch (command) {
    case 'eval': {
      const [symbol, ...operands] = rest;
      if (symbol === undefined) {
        throw new Error('eval takes an operator and its operands');
      }
      return {
        mode: 'eval',
        operator: readOperator(symbol),
        operands,
        evaluation,
      };
    }
    case 'match': {
      const [subject, ...labels] = rest;
      if (subject === undefined || labels.length === 0) {
        throw new Error('match takes a subject and at least one label');
      }
      return { mode: 'match', subject, labels };
    }
    case 'table': {
      const [symbol] = rest;
      if (symbol === undefined || rest.length > 1) {
        throw new Error('table takes exactly one operator');
      }
      return { mode: 'table', operator: readOperator(symbol), evaluation };
    }
    case 'explain':
      if (rest.length > 1) {
        throw new Error('explain takes at most one error ID');
      }
      return { mode: 'explain', errorId: rest[0] };
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

// ============================================================
// EXECUTION
// ============================================================

/** Read the package version from package.json */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  throw new Error('package.json has no version');
}

function run(
  command: CliCommand,
  observability: ObservabilityCallbacks
): string[] {
  switch (command.mode) {
    case 'help':
      return [HELP_TEXT];
    case 'version':
      return [`strict-ops ${readVersion()}`];
    case 'eval': {
      const ctx = createEngineContext({ observability });
      const operands = command.operands.map(parseOperand);
      const result = evaluateOperator(
        command.operator,
        operands,
        command.evaluation,
        ctx
      );
      return [formatOutput(result)];
    }
    case 'match': {
      const labels: CaseLabel[] = command.labels.map((text) =>
        text === 'default' ? 'default' : parseOperand(text)
      );
      const index = selectCase(parseOperand(command.subject), labels);
      if (index === -1) return ['no match'];
      return [`case ${index}: ${command.labels[index]}`];
    }
    case 'table':
      return [renderRuleTable(command.operator, command.evaluation)];
    case 'explain': {
      if (command.errorId === undefined) return [listErrors()];
      const documentation = explainError(command.errorId);
      if (documentation === null) {
        throw new Error(`Unknown error ID: ${command.errorId}`);
      }
      return [documentation];
    }
  }
}

/**
 * Execute a parsed command.
 * Rule traces and errors go to stderr; the result goes to stdout.
 *
 * @example
 * executeCommand(parseArgs(['eval', '+', '1', '2']), createDefaultConfig())
 * // { code: 0, stdout: ['int(3)'], stderr: [] }
 */
export function executeCommand(
  command: CliCommand,
  config: CliConfig
): CommandResult {
  const stderr: string[] = [];
  const observability: ObservabilityCallbacks = config.trace
    ? { onRule: (event) => stderr.push(formatRuleEvent(event)) }
    : {};

  try {
    return { code: 0, stdout: run(command, observability), stderr };
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    stderr.push(formatError(err));
    if (config.explain && err instanceof EngineError) {
      const documentation = explainError(err.errorId);
      if (documentation !== null) stderr.push('', documentation);
    }
    return { code: 1, stdout: [], stderr };
  }
}
