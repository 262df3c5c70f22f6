/**
 * Fixed demonstration expressions used by the CLI.
 */

import type { Expression } from './symbolic/AST.js';
import { E } from './symbolic/ExpressionUtils.js';
import { render } from './symbolic/Render.js';
import { constant, variable, Sum, Product, Power } from './symbolic/Simplify.js';
import { differentiate, type DifferentiationOptions } from './symbolic/SymbolicDiff.js';

export interface DemoResult {
  expression: Expression;
  derivative: Expression;
}

/**
 * Build 5*x^69 + 5*x^420, 5^(69*x) and e^(69*x)
 */
export function buildDemoExpressions(): Expression[] {
  const x = variable('x');
  const c69 = constant(69);
  const c420 = constant(420);
  const c5 = constant(5);
  const e = constant(E);

  return [
    Sum.create(
      Product.create(c5, Power.create(x, c69)),
      Product.create(c5, Power.create(x, c420))
    ),
    Power.create(c5, Product.create(c69, x)),
    Power.create(e, Product.create(c69, x))
  ];
}

export function runDemo(wrt: string, options: DifferentiationOptions = {}): DemoResult[] {
  return buildDemoExpressions().map(expression => ({
    expression,
    derivative: differentiate(expression, wrt, options)
  }));
}

/**
 * One line per result: `expression<TAB>:<TAB>derivative`
 */
export function formatDemo(results: DemoResult[]): string {
  return results
    .map(({ expression, derivative }) => `${render(expression)}\t:\t${render(derivative)}`)
    .join('\n');
}
