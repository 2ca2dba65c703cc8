/**
 * CLI Shared Utilities
 * Operand parsing and formatting functions for the strict-ops CLI
 */

import * as yaml from 'yaml';
import {
  arrayValue,
  boolValue,
  describeOutcome,
  fitsInt,
  floatValue,
  formatValue,
  intValue,
  listValue,
  NULL_VALUE,
  objectValue,
  resolveRule,
  resolveUnaryRule,
  resourceValue,
  stringValue,
} from './runtime/index.js';
import type {
  ArrayKey,
  Outcome,
  RuleEvent,
  Value,
} from './runtime/index.js';
import {
  ConfigError,
  EngineError,
  isUnaryOperator,
  TYPE_TAGS,
} from './types.js';
import type { EvaluationMode, Operator } from './types.js';

// ============================================================
// OPERAND PARSING
// ============================================================

/** Map key naming the class of an object literal */
const CLASS_KEY = '$class';
/** Map key naming the kind of a resource literal */
const RESOURCE_KEY = '$resource';

/**
 * Read a CLI operand written as a YAML flow literal.
 *
 * Integers become int, other numbers float. Sequences become lists and
 * mappings arrays, except mappings with a `$class` key (objects) or a
 * `$resource` key (resources, with an optional `id`).
 *
 * @throws ConfigError (OPS-C002) for literals with no value counterpart
 *
 * @example
 * parseOperand('[1, "a"]')        // array(2) {[0] => int(1), [1] => string(1) "a"}
 * parseOperand('{$class: P, x: 1}') // object(P) {["x"] => int(1)}
 */
export function parseOperand(text: string): Value {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text, { intAsBigInt: true, mapAsMap: true });
  } catch (error) {
    throw new ConfigError('OPS-C002', {
      text,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return toValue(parsed, text);
}

function invalid(text: string, reason: string): ConfigError {
  return new ConfigError('OPS-C002', { text, reason });
}

function toValue(node: unknown, text: string): Value {
  if (node === null || node === undefined) return NULL_VALUE;
  if (typeof node === 'bigint') {
    if (!fitsInt(node)) throw invalid(text, `integer ${node} out of range`);
    return intValue(node);
  }
  if (typeof node === 'number') return floatValue(node);
  if (typeof node === 'boolean') return boolValue(node);
  if (typeof node === 'string') return stringValue(node);
  if (Array.isArray(node)) {
    return listValue(node.map((item: unknown) => toValue(item, text)));
  }
  if (node instanceof Map) return mapToValue(node, text);
  throw invalid(text, 'unsupported literal');
}

function mapToValue(map: Map<unknown, unknown>, text: string): Value {
  const className = map.get(CLASS_KEY);
  if (className !== undefined) {
    if (typeof className !== 'string') {
      throw invalid(text, `${CLASS_KEY} must be a class name`);
    }
    const properties: [string, Value][] = [];
    for (const [key, item] of map) {
      if (key === CLASS_KEY) continue;
      if (typeof key !== 'string') {
        throw invalid(text, 'property names must be strings');
      }
      properties.push([key, toValue(item, text)]);
    }
    return objectValue(className, properties);
  }

  const kind = map.get(RESOURCE_KEY);
  if (kind !== undefined) {
    const id = map.get('id') ?? 1n;
    if (typeof kind !== 'string' || typeof id !== 'bigint') {
      throw invalid(text, 'resources take a kind name and an integer id');
    }
    return resourceValue(Number(id), kind);
  }

  const entries: [ArrayKey | number, Value][] = [];
  for (const [key, item] of map) {
    entries.push([arrayKey(key, text), toValue(item, text)]);
  }
  return arrayValue(entries);
}

function arrayKey(key: unknown, text: string): ArrayKey | number {
  if (typeof key === 'string') return key;
  if (typeof key === 'number' && Number.isFinite(key)) return key;
  if (typeof key === 'bigint' && fitsInt(key)) return key;
  throw invalid(text, 'array keys must be integers or strings');
}

// ============================================================
// OUTPUT FORMATTING
// ============================================================

/**
 * Convert evaluation result to human-readable string
 *
 * @param value - The value to format
 * @returns Formatted string representation
 */
export function formatOutput(value: Value): string {
  return formatValue(value);
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof EngineError) return err.format();
  return err.message;
}

/**
 * Format a rule event as one trace line.
 *
 * @example
 * // [strict] int > float: widen left to float
 * // [strict] ++string: unsupported string
 */
export function formatRuleEvent(event: RuleEvent): string {
  const application =
    event.rightType === undefined
      ? `${event.operator}${event.leftType}`
      : `${event.leftType} ${event.operator} ${event.rightType}`;
  return `[${event.mode}] ${application}: ${describeOutcome(event.outcome)}`;
}

// ============================================================
// RULE TABLES
// ============================================================

const COLUMN_WIDTH = 9;

function outcomeCell(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'compute':
      return 'ok';
    case 'legacy':
      return 'L';
    case 'widen':
      return outcome.operand === 'left' ? 'wL' : 'wR';
    case 'reject':
      return outcome.reason.variant === 'unsupported' ? 'U' : 'M';
  }
}

const LEGEND =
  'ok = compute, wL/wR = widen left/right to float, U = unsupported, M = mismatch, L = legacy';

/** Notes for cells whose outcome also depends on the operand value */
const CELL_NOTES: Partial<Record<Operator, string>> = {
  '.': 'object cells hold only for objects with a string conversion; others are U',
};

/**
 * Render the rule table of an operator.
 * Binary operators print a grid (rows: left type, columns: right type);
 * unary operators print one line per operand type.
 */
export function renderRuleTable(
  op: Operator,
  mode: EvaluationMode = 'strict'
): string {
  if (isUnaryOperator(op)) {
    return TYPE_TAGS.map(
      (tag) =>
        `${tag.padEnd(COLUMN_WIDTH)}${describeOutcome(resolveUnaryRule(op, mode, tag))}`
    ).join('\n');
  }

  const lines = [
    `${op.padEnd(COLUMN_WIDTH)}${TYPE_TAGS.map((tag) => tag.padEnd(COLUMN_WIDTH)).join('')}`.trimEnd(),
  ];
  for (const left of TYPE_TAGS) {
    const cells = TYPE_TAGS.map((right) =>
      outcomeCell(resolveRule(op, mode, left, right)).padEnd(COLUMN_WIDTH)
    );
    lines.push(`${left.padEnd(COLUMN_WIDTH)}${cells.join('')}`.trimEnd());
  }
  lines.push('', LEGEND);
  const note = mode === 'strict' ? CELL_NOTES[op] : undefined;
  if (note !== undefined) lines.push(note);
  return lines.join('\n');
}
