/**
 * Shared predicates over expression nodes.
 */

import type { ConstantNode, Expression } from './AST.js';

/** Euler's number */
export const E = 2.718281828459045;

/** Absolute tolerance used when recognising a constant as e */
export const E_TOLERANCE = 1e-10;

export function isConstant(node: Expression): node is ConstantNode {
  return node.type === 'Constant';
}

/**
 * True when the node is a constant with exactly the given value
 */
export function isConstantValue(node: Expression, value: number): boolean {
  return node.type === 'Constant' && node.value === value;
}

export function isConstantE(node: Expression): boolean {
  return node.type === 'Constant' && Math.abs(node.value - E) < E_TOLERANCE;
}

/**
 * Check if two expressions are structurally equal
 */
export function nodesEqual(a: Expression, b: Expression): boolean {
  if (a === b) return true;

  switch (a.type) {
    case 'Constant':
      return b.type === 'Constant' && a.value === b.value;
    case 'Variable':
      return b.type === 'Variable' && a.name === b.name;
    case 'Sum':
      return b.type === 'Sum' && operandsEqual(a, b);
    case 'Difference':
      return b.type === 'Difference' && operandsEqual(a, b);
    case 'Product':
      return b.type === 'Product' && operandsEqual(a, b);
    case 'Quotient':
      return b.type === 'Quotient' && operandsEqual(a, b);
    case 'Power':
      return b.type === 'Power' &&
             nodesEqual(a.base, b.base) &&
             nodesEqual(a.exponent, b.exponent);
    case 'NaturalLog':
      return b.type === 'NaturalLog' && nodesEqual(a.argument, b.argument);
  }
}

interface BinaryOperands {
  readonly left: Expression;
  readonly right: Expression;
}

function operandsEqual(a: BinaryOperands, b: BinaryOperands): boolean {
  return nodesEqual(a.left, b.left) && nodesEqual(a.right, b.right);
}
