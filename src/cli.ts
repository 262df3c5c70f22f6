#!/usr/bin/env node

import { formatDemo, runDemo } from './demo.js';
import type { DifferentiationOptions } from './symbolic/SymbolicDiff.js';

function printUsage() {
  console.log(`
expr-deriv - Symbolic differentiation of expression trees

Usage:
  expr-deriv [options]

Builds the demonstration expressions, differentiates each one and prints
"expression : derivative" per line.

Options:
  --wrt <name>          Variable to differentiate by (default: x)
  --legacy              Use the historical difference and quotient rules
  --verbose             Print stack traces on failure
  --help, -h            Show this help message

Examples:
  expr-deriv
  expr-deriv --wrt y
  expr-deriv --legacy
  `.trim());
}

function main() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const options: DifferentiationOptions = { rules: 'corrected' };
  let wrt = 'x';
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--wrt') {
      if (i + 1 >= args.length) {
        console.error('Error: Missing value for --wrt');
        process.exit(1);
      }
      wrt = args[++i];
      if (wrt.length === 0) {
        console.error('Error: Variable name must not be empty');
        process.exit(1);
      }
    } else if (arg === '--legacy') {
      options.rules = 'legacy';
    } else if (arg === '--verbose') {
      verbose = true;
    } else {
      console.error(`Error: Unknown option "${arg}"`);
      printUsage();
      process.exit(1);
    }
  }

  try {
    console.log(formatDemo(runDemo(wrt, options)));
  } catch (err) {
    console.error('Error: Failed to differentiate demonstration expressions');
    if (err instanceof Error) {
      console.error(err.message);
      if (verbose && err.stack) {
        console.error('\nStack trace:');
        console.error(err.stack);
      }
    }
    process.exit(1);
  }
}

main();
