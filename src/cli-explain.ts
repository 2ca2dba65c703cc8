/**
 * CLI Error Explanation
 * Function for rendering full error documentation
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from './types.js';

/**
 * Render full error documentation for the explain command.
 *
 * @param errorId - Error identifier (format: OPS-{category}{3-digit})
 * @returns Formatted documentation string, or null if errorId is invalid/unknown
 *
 * @example
 * explainError("OPS-T002")
 * // Returns: documentation with cause, resolution and examples sections
 *
 * @example
 * explainError("invalid")
 * // Returns: null
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];

  // Header: errorId and description
  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push('');

  // Cause section (if present)
  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  // Resolution section (if present)
  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  // Examples section (if present)
  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push(`    ${example.code}`);
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}

/**
 * One line per registered error: ID, category and description.
 *
 * @example
 * // OPS-T001  type        Unsupported operand type
 */
export function listErrors(): string {
  const lines: string[] = [];
  for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
    lines.push(
      `${errorId}  ${definition.category.padEnd(12)}${definition.description}`
    );
  }
  return lines.join('\n');
}
