import { describe, it, expect } from 'vitest';
import { buildDemoExpressions, formatDemo, runDemo } from '../src/demo.js';

describe('Demonstration expressions', () => {
  it('should build the three demo expressions', () => {
    expect(buildDemoExpressions().map(expr => expr.toString())).toEqual([
      '((5 * (x ^ 69)) + (5 * (x ^ 420)))',
      '(5 ^ (69 * x))',
      '(2.718281828459045 ^ (69 * x))'
    ]);
  });

  it('should print each expression with its derivative', () => {
    expect(formatDemo(runDemo('x')).split('\n')).toEqual([
      '((5 * (x ^ 69)) + (5 * (x ^ 420)))\t:\t((5 * (69 * (x ^ 68))) + (5 * (420 * (x ^ 419))))',
      '(5 ^ (69 * x))\t:\t(((5 ^ (69 * x)) * ln(5)) * 69)',
      '(2.718281828459045 ^ (69 * x))\t:\t((2.718281828459045 ^ (69 * x)) * 69)'
    ]);
  });

  it('should produce the same output under the legacy rules', () => {
    expect(formatDemo(runDemo('x', { rules: 'legacy' }))).toBe(formatDemo(runDemo('x')));
  });

  it('should yield zero derivatives for an unrelated variable', () => {
    const derivatives = runDemo('y').map(result => result.derivative.toString());
    expect(derivatives).toEqual(['0', '0', '0']);
  });
});
