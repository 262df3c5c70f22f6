/**
 * Text rendering for expression trees.
 *
 * Composites render fully parenthesized (`(A op B)`), constants as plain
 * decimal literals, variables by name and logarithms as `ln(A)`.
 */

import type { Expression } from './AST.js';

export function render(node: Expression): string {
  return node.toString();
}

/**
 * Write the rendering of an expression to an output stream
 */
export function writeExpression(out: NodeJS.WritableStream, node: Expression): void {
  out.write(render(node));
}
