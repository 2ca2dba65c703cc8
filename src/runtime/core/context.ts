/**
 * Engine Context
 *
 * Creation of the immutable context that carries host collaborators and
 * observability callbacks into every evaluation call.
 */

import type { EngineContext, EngineOptions } from './types.js';
import { isTruthy, type ObjectValue, type StringConverter } from './values.js';

/** Default capability lookup: the object's own __toString method */
function ownStringConverter(object: ObjectValue): StringConverter | undefined {
  return object.toStringMethod;
}

/**
 * Create an engine context.
 * Omitted collaborators fall back to the built-in truthiness rule and
 * the object's own string conversion method. Weak mode stays unavailable
 * until a legacy evaluator is supplied.
 */
export function createEngineContext(
  options: EngineOptions = {}
): EngineContext {
  return Object.freeze({
    legacy: options.legacy,
    truthiness: options.truthiness ?? isTruthy,
    stringConversion: options.stringConversion ?? ownStringConverter,
    observability: Object.freeze({ ...options.observability }),
  });
}

/** Context used when a caller passes none */
export const DEFAULT_CONTEXT: EngineContext = createEngineContext();
