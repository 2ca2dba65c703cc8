/**
 * Engine Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface EngineErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Render the registry template for an error ID.
 * Throws TypeError for IDs missing from the registry, or registered
 * under a different category than the caller expects.
 */
function renderRegistered(
  errorId: string,
  context: Record<string, unknown>,
  category?: ErrorCategory
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all engine errors.
 * Hosts translate these into the language's own fatal-error channel.
 */
export class EngineError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: EngineErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'EngineError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): EngineErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: EngineErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${this.errorId}: ${this.message}`;
  }
}

// ============================================================
// OPERAND TYPE ERRORS
// ============================================================

/** Which of the two operand type error variants was raised */
export type OperandTypeErrorVariant = 'unsupported' | 'mismatch';

/**
 * Operand type rejection. Raised only under strict mode, never
 * recovered from inside the engine.
 */
export class OperandTypeError extends EngineError {
  readonly variant: OperandTypeErrorVariant;
  readonly operator: string;

  constructor(
    errorId: string,
    variant: OperandTypeErrorVariant,
    operator: string,
    context: Record<string, unknown>
  ) {
    super({
      errorId,
      message: renderRegistered(errorId, context, 'type'),
      context,
    });
    this.name = 'OperandTypeError';
    this.variant = variant;
    this.operator = operator;
  }
}

/** The operator does not accept this type, independent of the other operand */
export class UnsupportedOperandError extends OperandTypeError {
  readonly type: string;

  constructor(operator: string, type: string) {
    super('OPS-T001', 'unsupported', operator, { operator, type });
    this.name = 'UnsupportedOperandError';
    this.type = type;
  }
}

/**
 * Both types are accepted by the operator but differ from each other.
 * For objects of different classes, left and right hold the class names.
 */
export class OperandMismatchError extends OperandTypeError {
  readonly left: string;
  readonly right: string;

  constructor(operator: string, left: string, right: string) {
    super('OPS-T002', 'mismatch', operator, { operator, left, right });
    this.name = 'OperandMismatchError';
    this.left = left;
    this.right = right;
  }
}

// ============================================================
// ARITHMETIC ERRORS
// ============================================================

/** Value-level arithmetic failures (shift counts, zero divisors) */
export class ArithmeticError extends EngineError {
  readonly operator: string;

  constructor(errorId: string, operator: string) {
    super({
      errorId,
      message: renderRegistered(errorId, { operator }, 'arithmetic'),
      context: { operator },
    });
    this.name = 'ArithmeticError';
    this.operator = operator;
  }
}

/** `/` or `%` with a zero divisor */
export class DivisionByZeroError extends ArithmeticError {
  constructor(operator: '/' | '%') {
    super(operator === '/' ? 'OPS-A001' : 'OPS-A002', operator);
    this.name = 'DivisionByZeroError';
  }
}

// ============================================================
// INTERNAL AND CONFIGURATION ERRORS
// ============================================================

/** Engine misuse by a caller: never a user program bug */
export class InternalError extends EngineError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super({
      errorId,
      message: renderRegistered(errorId, context, 'internal'),
      context,
    });
    this.name = 'InternalError';
  }
}

/** Configuration file and CLI operand errors */
export class ConfigError extends EngineError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super({
      errorId,
      message: renderRegistered(errorId, context, 'config'),
      context,
    });
    this.name = 'ConfigError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Picks the error class from the definition's category, so hosts can
 * raise registry errors by ID alone.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("OPS-I003", { operator: "<>" })
 * // Creates InternalError: "Unknown operator <>"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): EngineError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const operator = String(context['operator'] ?? '');
  switch (definition.category) {
    case 'type':
      return errorId === 'OPS-T001'
        ? new UnsupportedOperandError(operator, String(context['type'] ?? ''))
        : new OperandMismatchError(
            operator,
            String(context['left'] ?? ''),
            String(context['right'] ?? '')
          );
    case 'arithmetic':
      if (errorId === 'OPS-A001') return new DivisionByZeroError('/');
      if (errorId === 'OPS-A002') return new DivisionByZeroError('%');
      return new ArithmeticError(errorId, operator);
    case 'internal':
      return new InternalError(errorId, context);
    case 'config':
      return new ConfigError(errorId, context);
  }
}
