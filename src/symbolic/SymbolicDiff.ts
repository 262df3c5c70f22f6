/**
 * Symbolic differentiation engine.
 * Applies differentiation rules to an expression tree. Every result is built
 * through the smart constructors, so derivatives come back already
 * simplified.
 */

import {
  Expression,
  ExpressionVisitor,
  ConstantNode,
  VariableNode,
  SumNode,
  DifferenceNode,
  ProductNode,
  QuotientNode,
  PowerNode,
  NaturalLogNode
} from './AST.js';
import { UnsupportedDifferentiationError } from './Errors.js';
import { isConstant } from './ExpressionUtils.js';
import { Sum, Difference, Product, Quotient, Power, NaturalLog } from './Simplify.js';

/**
 * `corrected` applies the textbook difference and quotient rules.
 * `legacy` reproduces the historical construction: the derivative of
 * `u - v` is built as `u' + v'`, and the quotient numerator as
 * `u * v' - v' * u`.
 */
export type DerivativeRules = 'corrected' | 'legacy';

export interface DifferentiationOptions {
  rules?: DerivativeRules;
}

/**
 * Differentiate an expression with respect to a variable
 */
export class DifferentiationVisitor implements ExpressionVisitor<Expression> {
  private readonly rules: DerivativeRules;

  constructor(
    private wrt: string,
    options: DifferentiationOptions = {}
  ) {
    this.rules = options.rules ?? 'corrected';
  }

  visitConstant(_node: ConstantNode): Expression {
    // d/dx(c) = 0
    return new ConstantNode(0);
  }

  visitVariable(node: VariableNode): Expression {
    // d/dx(x) = 1, d/dx(y) = 0
    return new ConstantNode(node.name === this.wrt ? 1 : 0);
  }

  visitSum(node: SumNode): Expression {
    const du = node.left.accept(this);
    const dv = node.right.accept(this);

    if (isConstant(du) && isConstant(dv)) {
      return new ConstantNode(du.value + dv.value);
    }
    return Sum.create(du, dv);
  }

  visitDifference(node: DifferenceNode): Expression {
    const du = node.left.accept(this);
    const dv = node.right.accept(this);

    if (isConstant(du) && isConstant(dv)) {
      return new ConstantNode(du.value - dv.value);
    }
    if (this.rules === 'legacy') {
      return Sum.create(du, dv);
    }
    return Difference.create(du, dv);
  }

  visitProduct(node: ProductNode): Expression {
    const u = node.left;
    const v = node.right;
    const du = u.accept(this);
    const dv = v.accept(this);

    // d/dx(u * v) = u * dv/dx + du/dx * v  (product rule)
    return Sum.create(Product.create(u, dv), Product.create(du, v));
  }

  visitQuotient(node: QuotientNode): Expression {
    const u = node.left;
    const v = node.right;
    const du = u.accept(this);
    const dv = v.accept(this);

    // d/dx(u / v) = (du/dx * v - u * dv/dx) / v^2  (quotient rule)
    const numerator = this.rules === 'legacy'
      ? Difference.create(Product.create(u, dv), Product.create(dv, u))
      : Difference.create(Product.create(du, v), Product.create(u, dv));

    return Quotient.create(numerator, Power.create(v, new ConstantNode(2)));
  }

  visitPower(node: PowerNode): Expression {
    const base = node.base;
    const exponent = node.exponent;

    if (!isConstant(base) && isConstant(exponent)) {
      // d/dx(u^c) = c * u^(c-1) * du/dx  (power rule)
      const du = base.accept(this);
      const reduced = Power.create(base, new ConstantNode(exponent.value - 1));
      return Product.create(Product.create(exponent, reduced), du);
    }

    if (isConstant(base) && !isConstant(exponent)) {
      // d/dx(c^v) = c^v * ln(c) * dv/dx
      const dv = exponent.accept(this);
      return Product.create(
        Product.create(Power.create(base, exponent), NaturalLog.create(base)),
        dv
      );
    }

    throw new UnsupportedDifferentiationError(
      node.toString(),
      isConstant(base)
        ? 'base and exponent are both constants'
        : 'base and exponent are both non-constant'
    );
  }

  visitNaturalLog(node: NaturalLogNode): Expression {
    const arg = node.argument;
    const darg = arg.accept(this);

    // d/dx(ln(u)) = 1/u * du/dx
    return Product.create(Quotient.create(new ConstantNode(1), arg), darg);
  }
}

/**
 * Differentiate an expression with respect to a variable.
 *
 * Differentiating by a variable that does not occur yields the constant 0.
 *
 * @throws {UnsupportedDifferentiationError} for a power whose base and
 * exponent are both constant or both non-constant
 */
export function differentiate(
  node: Expression,
  wrt: VariableNode | string,
  options: DifferentiationOptions = {}
): Expression {
  const name = typeof wrt === 'string' ? wrt : wrt.name;
  const visitor = new DifferentiationVisitor(name, options);
  return node.accept(visitor);
}
