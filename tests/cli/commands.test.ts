/**
 * CLI Tests: Commands
 * Tests for argument parsing and command execution
 */

import { describe, expect, it } from 'vitest';

import { explainError } from '../../src/cli-explain.js';
import { executeCommand, parseArgs } from '../../src/cli-commands.js';
import { createDefaultConfig } from '../../src/config.js';
import { InternalError } from '../../src/index.js';

function runArgs(
  argv: string[],
  config = createDefaultConfig()
): ReturnType<typeof executeCommand> {
  return executeCommand(parseArgs(argv), config);
}

describe('CLI: Commands', () => {
  describe('parseArgs', () => {
    it('defaults to help without arguments', () => {
      expect(parseArgs([])).toEqual({ mode: 'help' });
    });

    it('honors --help and --version anywhere', () => {
      expect(parseArgs(['eval', '+', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['table', '--version'])).toEqual({ mode: 'version' });
    });

    it('parses eval commands', () => {
      expect(parseArgs(['eval', '+', '1', '2'])).toEqual({
        mode: 'eval',
        operator: '+',
        operands: ['1', '2'],
        evaluation: 'strict',
      });
    });

    it('reads a bare -- as the decrement operator', () => {
      expect(parseArgs(['--weak', 'eval', '--', '1'])).toEqual({
        mode: 'eval',
        operator: '--',
        operands: ['1'],
        evaluation: 'weak',
      });
    });

    it('parses match, table and explain commands', () => {
      expect(parseArgs(['match', '0', '1', 'default'])).toEqual({
        mode: 'match',
        subject: '0',
        labels: ['1', 'default'],
      });
      expect(parseArgs(['table', '<=>'])).toEqual({
        mode: 'table',
        operator: '<=>',
        evaluation: 'strict',
      });
      expect(parseArgs(['explain'])).toEqual({
        mode: 'explain',
        errorId: undefined,
      });
    });

    it('throws OPS-I003 for unknown operators', () => {
      try {
        parseArgs(['eval', '<>', '1', '2']);
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(InternalError);
        expect(err).toMatchObject({ errorId: 'OPS-I003' });
      }
    });

    it('rejects unknown options and commands', () => {
      expect(() => parseArgs(['--color', 'eval'])).toThrow(
        'Unknown option: --color'
      );
      expect(() => parseArgs(['frob'])).toThrow('Unknown command: frob');
    });

    it('rejects commands missing arguments', () => {
      expect(() => parseArgs(['eval'])).toThrow(
        'eval takes an operator and its operands'
      );
      expect(() => parseArgs(['match', '1'])).toThrow(
        'match takes a subject and at least one label'
      );
      expect(() => parseArgs(['table', '+', '-'])).toThrow(
        'table takes exactly one operator'
      );
    });
  });

  describe('executeCommand', () => {
    it('prints the result of an evaluation', () => {
      expect(runArgs(['eval', '+', '1', '2'])).toEqual({
        code: 0,
        stdout: ['int(3)'],
        stderr: [],
      });
    });

    it('traces rule resolution to stderr', () => {
      const result = runArgs(['eval', '>', '1', '1.5'], {
        trace: true,
        explain: false,
      });
      expect(result).toEqual({
        code: 0,
        stdout: ['bool(false)'],
        stderr: ['[strict] int > float: widen left to float'],
      });
    });

    it('reports errors with exit code 1', () => {
      expect(runArgs(['eval', '+', '1'])).toEqual({
        code: 1,
        stdout: [],
        stderr: ['OPS-I004: Operator + takes 2 operand(s), got 1'],
      });
    });

    it('appends documentation when explain is enabled', () => {
      const result = runArgs(['eval', '>', '"42"', '10'], {
        trace: false,
        explain: true,
      });
      expect(result.code).toBe(1);
      expect(result.stderr).toEqual([
        'OPS-T002: Operand type mismatch string and int for >',
        '',
        explainError('OPS-T002'),
      ]);
    });

    it('requires a legacy evaluator for weak mode', () => {
      expect(runArgs(['--weak', 'eval', '+', '1', '2']).stderr).toEqual([
        'OPS-I002: Weak mode evaluation of + requires a legacy operator evaluator',
      ]);
    });

    it('selects switch cases', () => {
      expect(runArgs(['match', '0', '"0"', 'default']).stdout).toEqual([
        'case 1: default',
      ]);
      expect(runArgs(['match', '[1, 2]', '[1]', '[1, 2]']).stdout).toEqual([
        'case 1: [1, 2]',
      ]);
      expect(runArgs(['match', '3', '1', '2']).stdout).toEqual(['no match']);
    });

    it('prints rule tables', () => {
      const [table] = runArgs(['table', '~']).stdout;
      expect(table?.split('\n')[0]).toBe('int      compute');
    });

    it('lists errors and rejects unknown IDs', () => {
      expect(runArgs(['explain']).stdout[0]?.split('\n')).toHaveLength(11);
      expect(runArgs(['explain', 'OPS-T999'])).toEqual({
        code: 1,
        stdout: [],
        stderr: ['Unknown error ID: OPS-T999'],
      });
    });

    it('prints the package version', () => {
      expect(runArgs(['--version']).stdout[0]).toMatch(
        /^strict-ops \d+\.\d+\.\d+$/
      );
    });

    it('prints help', () => {
      expect(runArgs([]).stdout[0]).toMatch(/^Strict Operator Engine\n/);
    });
  });
});
