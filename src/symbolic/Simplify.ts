/**
 * Smart constructors for expression nodes.
 *
 * Each factory inspects constant operands and applies identity and
 * annihilator rules before allocating, so a tree built through them never
 * holds a trivially reducible node at the moment of creation. The first
 * matching rule wins. Two non-constant operands are never compared, so
 * `x - x` stays as written.
 */

import {
  Expression,
  ConstantNode,
  VariableNode,
  SumNode,
  DifferenceNode,
  ProductNode,
  QuotientNode,
  PowerNode,
  NaturalLogNode
} from './AST.js';
import { DivisionByZeroError, LogOfZeroError } from './Errors.js';
import { isConstantE, isConstantValue } from './ExpressionUtils.js';

export function constant(value: number): ConstantNode {
  return new ConstantNode(value);
}

export function variable(name: string): VariableNode {
  return new VariableNode(name);
}

export const Sum = {
  create(left: Expression, right: Expression): Expression {
    // 0 + x = x
    if (isConstantValue(left, 0)) return right;
    // x + 0 = x
    if (isConstantValue(right, 0)) return left;

    return new SumNode(left, right);
  }
};

export const Difference = {
  create(left: Expression, right: Expression): Expression {
    // x - 0 = x
    if (isConstantValue(right, 0)) return left;

    return new DifferenceNode(left, right);
  }
};

export const Product = {
  create(left: Expression, right: Expression): Expression {
    // 0 * x = x * 0 = 0
    if (isConstantValue(left, 0) || isConstantValue(right, 0)) {
      return new ConstantNode(0);
    }
    // 1 * x = x
    if (isConstantValue(left, 1)) return right;
    // x * 1 = x
    if (isConstantValue(right, 1)) return left;

    return new ProductNode(left, right);
  }
};

export const Quotient = {
  /**
   * @throws {DivisionByZeroError} when the divisor is the constant 0
   */
  create(left: Expression, right: Expression): Expression {
    if (isConstantValue(right, 0)) {
      throw new DivisionByZeroError(left.toString());
    }
    // x / 1 = x
    if (isConstantValue(right, 1)) return left;
    // 0 / x = 0
    if (isConstantValue(left, 0)) return new ConstantNode(0);

    return new QuotientNode(left, right);
  }
};

export const Power = {
  /**
   * The x^0 and x^1 rules only fire for a non-constant base; a constant
   * base is kept as written.
   */
  create(base: Expression, exponent: Expression): Expression {
    if (!base.isConstant()) {
      // x^0 = 1
      if (isConstantValue(exponent, 0)) return new ConstantNode(1);
      // x^1 = x
      if (isConstantValue(exponent, 1)) return base;
    }

    return new PowerNode(base, exponent);
  }
};

export const NaturalLog = {
  /**
   * @throws {LogOfZeroError} when the argument is the constant 0
   */
  create(argument: Expression): Expression {
    if (isConstantValue(argument, 0)) {
      throw new LogOfZeroError();
    }
    // ln(e) = 1
    if (isConstantE(argument)) return new ConstantNode(1);

    return new NaturalLogNode(argument);
  }
};
