// This module provides the calculator tool family: plain arithmetic over JSON numbers.

import { z } from 'zod';
import type { ToolRegistry } from '../mcp/registry.js';
import { textResult } from '../mcp/results.js';
import { AppError } from '../utils/errors.js';

const operandsSchema = z.object({
  a: z.number().describe('First number'),
  b: z.number().describe('Second number')
});

export const powerSchema = z.object({
  base: z.number().describe('Base number'),
  exponent: z.number().describe('Exponent')
});

export const sqrtSchema = z.object({
  number: z.number().describe('Number to take the square root of')
});

// 170! is the largest factorial that still fits in a double.
export const factorialSchema = z.object({
  n: z.number().int().max(170).describe('Non-negative integer')
});

export function factorial(n: number): number {
  let result = 1;
  for (let i = 2; i <= n; i += 1) {
    result *= i;
  }
  return result;
}

export function registerCalculatorTools(registry: ToolRegistry): void {
  registry.register({
    name: 'add',
    description: 'Add two numbers',
    inputSchema: operandsSchema,
    execute: ({ a, b }) => textResult(String(a + b))
  });

  registry.register({
    name: 'subtract',
    description: 'Subtract second number from first number',
    inputSchema: operandsSchema,
    execute: ({ a, b }) => textResult(String(a - b))
  });

  registry.register({
    name: 'multiply',
    description: 'Multiply two numbers',
    inputSchema: operandsSchema,
    execute: ({ a, b }) => textResult(String(a * b))
  });

  registry.register({
    name: 'divide',
    description: 'Divide first number by second number',
    inputSchema: operandsSchema,
    execute: ({ a, b }) => {
      if (b === 0) {
        throw new AppError(422, 'division_by_zero', 'Division by zero is not allowed.');
      }
      return textResult(String(a / b));
    }
  });

  registry.register({
    name: 'power',
    description: 'Raise a number to a power',
    inputSchema: powerSchema,
    execute: ({ base, exponent }) => textResult(String(base ** exponent))
  });

  registry.register({
    name: 'sqrt',
    description: 'Calculate the square root of a number',
    inputSchema: sqrtSchema,
    execute: ({ number }) => {
      if (number < 0) {
        throw new AppError(422, 'negative_input', 'Cannot calculate square root of negative number.');
      }
      return textResult(String(Math.sqrt(number)));
    }
  });

  registry.register({
    name: 'factorial',
    description: 'Calculate the factorial of a non-negative integer',
    inputSchema: factorialSchema,
    execute: ({ n }) => {
      if (n < 0) {
        throw new AppError(422, 'negative_input', 'Factorial is not defined for negative numbers.');
      }
      return textResult(String(factorial(n)));
    }
  });
}
