/**
 * expr-deriv - Symbolic differentiation of algebraic expression trees
 *
 * Trees are built through simplifying smart constructors, differentiated
 * with respect to one variable at a time and rendered to a fully
 * parenthesized text form.
 */

// Construction
export {
  constant,
  variable,
  Sum,
  Difference,
  Product,
  Quotient,
  Power,
  NaturalLog
} from './symbolic/Simplify.js';

// Differentiation
export {
  differentiate,
  DifferentiationVisitor,
  type DerivativeRules,
  type DifferentiationOptions
} from './symbolic/SymbolicDiff.js';

// Rendering
export { render, writeExpression } from './symbolic/Render.js';

// Helpers
export {
  E,
  E_TOLERANCE,
  isConstant,
  isConstantValue,
  isConstantE,
  nodesEqual
} from './symbolic/ExpressionUtils.js';

// Errors
export {
  ExpressionError,
  DivisionByZeroError,
  LogOfZeroError,
  UnsupportedDifferentiationError
} from './symbolic/Errors.js';

// AST types
export {
  ConstantNode,
  VariableNode,
  SumNode,
  DifferenceNode,
  ProductNode,
  QuotientNode,
  PowerNode,
  NaturalLogNode,
  type Expression,
  type ExpressionNode,
  type ExpressionType,
  type ExpressionVisitor
} from './symbolic/AST.js';
