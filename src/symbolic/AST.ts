/**
 * Expression tree node definitions.
 *
 * Nodes are immutable once built. Composite nodes should be created through
 * the factories in `Simplify.ts`, which apply the identity and annihilator
 * rules before allocating.
 */

/**
 * Base interface for all expression nodes
 */
export interface ExpressionNode {
  readonly type: string;
  isConstant(): boolean;
  accept<T>(visitor: ExpressionVisitor<T>): T;
  toString(): string;
}

/**
 * Visitor pattern interface for traversing expressions
 */
export interface ExpressionVisitor<T> {
  visitConstant(node: ConstantNode): T;
  visitVariable(node: VariableNode): T;
  visitSum(node: SumNode): T;
  visitDifference(node: DifferenceNode): T;
  visitProduct(node: ProductNode): T;
  visitQuotient(node: QuotientNode): T;
  visitPower(node: PowerNode): T;
  visitNaturalLog(node: NaturalLogNode): T;
}

/**
 * Numeric constant node
 */
export class ConstantNode implements ExpressionNode {
  readonly type = 'Constant' as const;

  constructor(readonly value: number) {}

  isConstant(): boolean {
    return true;
  }

  accept<T>(visitor: ExpressionVisitor<T>): T {
    return visitor.visitConstant(this);
  }

  toString(): string {
    return String(this.value);
  }
}

/**
 * Variable reference node (e.g., 'x', 'rate')
 */
export class VariableNode implements ExpressionNode {
  readonly type = 'Variable' as const;

  constructor(readonly name: string) {}

  isConstant(): boolean {
    return false;
  }

  accept<T>(visitor: ExpressionVisitor<T>): T {
    return visitor.visitVariable(this);
  }

  toString(): string {
    return this.name;
  }
}

export class SumNode implements ExpressionNode {
  readonly type = 'Sum' as const;

  constructor(
    readonly left: Expression,
    readonly right: Expression
  ) {}

  isConstant(): boolean {
    return false;
  }

  accept<T>(visitor: ExpressionVisitor<T>): T {
    return visitor.visitSum(this);
  }

  toString(): string {
    return `(${this.left.toString()} + ${this.right.toString()})`;
  }
}

export class DifferenceNode implements ExpressionNode {
  readonly type = 'Difference' as const;

  constructor(
    readonly left: Expression,
    readonly right: Expression
  ) {}

  isConstant(): boolean {
    return false;
  }

  accept<T>(visitor: ExpressionVisitor<T>): T {
    return visitor.visitDifference(this);
  }

  toString(): string {
    return `(${this.left.toString()} - ${this.right.toString()})`;
  }
}

export class ProductNode implements ExpressionNode {
  readonly type = 'Product' as const;

  constructor(
    readonly left: Expression,
    readonly right: Expression
  ) {}

  isConstant(): boolean {
    return false;
  }

  accept<T>(visitor: ExpressionVisitor<T>): T {
    return visitor.visitProduct(this);
  }

  toString(): string {
    return `(${this.left.toString()} * ${this.right.toString()})`;
  }
}

/**
 * Quotient node. The divisor is never the constant 0 when built via
 * `Quotient.create`.
 */
export class QuotientNode implements ExpressionNode {
  readonly type = 'Quotient' as const;

  constructor(
    readonly left: Expression,
    readonly right: Expression
  ) {}

  isConstant(): boolean {
    return false;
  }

  accept<T>(visitor: ExpressionVisitor<T>): T {
    return visitor.visitQuotient(this);
  }

  toString(): string {
    return `(${this.left.toString()} / ${this.right.toString()})`;
  }
}

export class PowerNode implements ExpressionNode {
  readonly type = 'Power' as const;

  constructor(
    readonly base: Expression,
    readonly exponent: Expression
  ) {}

  isConstant(): boolean {
    return false;
  }

  accept<T>(visitor: ExpressionVisitor<T>): T {
    return visitor.visitPower(this);
  }

  toString(): string {
    return `(${this.base.toString()} ^ ${this.exponent.toString()})`;
  }
}

/**
 * Natural logarithm node, rendered as ln(argument)
 */
export class NaturalLogNode implements ExpressionNode {
  readonly type = 'NaturalLog' as const;

  constructor(readonly argument: Expression) {}

  isConstant(): boolean {
    return false;
  }

  accept<T>(visitor: ExpressionVisitor<T>): T {
    return visitor.visitNaturalLog(this);
  }

  toString(): string {
    return `ln(${this.argument.toString()})`;
  }
}

/**
 * Closed union of every node kind
 */
export type Expression =
  | ConstantNode
  | VariableNode
  | SumNode
  | DifferenceNode
  | ProductNode
  | QuotientNode
  | PowerNode
  | NaturalLogNode;

export type ExpressionType = Expression['type'];
