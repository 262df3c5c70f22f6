import { describe, it, expect } from 'vitest';
import { NaturalLogNode, PowerNode } from '../../src/symbolic/AST.js';
import {
  E,
  isConstant,
  isConstantE,
  isConstantValue,
  nodesEqual
} from '../../src/symbolic/ExpressionUtils.js';
import { constant, variable, Sum, Difference, Product } from '../../src/symbolic/Simplify.js';

describe('Expression utilities', () => {
  const x = variable('x');
  const y = variable('y');

  it('should narrow constants', () => {
    const node = constant(4);
    expect(isConstant(node)).toBe(true);
    expect(isConstant(x)).toBe(false);
  });

  it('should match exact constant values', () => {
    expect(isConstantValue(constant(1), 1)).toBe(true);
    expect(isConstantValue(constant(1.0000001), 1)).toBe(false);
    expect(isConstantValue(x, 1)).toBe(false);
  });

  it('should recognise e within 1e-10', () => {
    expect(isConstantE(constant(E))).toBe(true);
    expect(isConstantE(constant(Math.E))).toBe(true);
    expect(isConstantE(constant(E - 5e-11))).toBe(true);
    expect(isConstantE(constant(E + 1e-9))).toBe(false);
    expect(isConstantE(variable('e'))).toBe(false);
  });

  describe('nodesEqual', () => {
    it('should compare leaves by value and name', () => {
      expect(nodesEqual(constant(2), constant(2))).toBe(true);
      expect(nodesEqual(constant(2), constant(3))).toBe(false);
      expect(nodesEqual(variable('x'), variable('x'))).toBe(true);
      expect(nodesEqual(x, y)).toBe(false);
    });

    it('should compare composites structurally', () => {
      expect(nodesEqual(Sum.create(x, y), Sum.create(variable('x'), variable('y')))).toBe(true);
      expect(nodesEqual(Sum.create(x, y), Sum.create(y, x))).toBe(false);
      expect(nodesEqual(Sum.create(x, y), Difference.create(x, y))).toBe(false);
      expect(nodesEqual(new PowerNode(x, constant(2)), new PowerNode(x, constant(2)))).toBe(true);
      expect(nodesEqual(new NaturalLogNode(x), new NaturalLogNode(y))).toBe(false);
    });

    it('should hold for Sum.create with a zero operand', () => {
      const expr = Product.create(constant(3), Sum.create(x, y));
      expect(nodesEqual(Sum.create(constant(0), expr), expr)).toBe(true);
      expect(nodesEqual(Sum.create(expr, constant(0)), expr)).toBe(true);
    });
  });
});
