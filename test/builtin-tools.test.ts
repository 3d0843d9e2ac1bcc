// This test suite verifies the calculator and greeting tools through the registry's validated execution path.

import { describe, expect, it } from 'vitest';
import { ToolRegistry } from '../src/mcp/registry.js';
import { factorial, registerCalculatorTools } from '../src/tools/calculator.js';
import { formatServerTime, registerGreetingTools } from '../src/tools/greeting.js';
import type { InvocationResult } from '../src/types/mcp.js';
import { createCapturingLogger } from './helpers.js';

function createRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registerCalculatorTools(registry);
  registerGreetingTools(registry, () => new Date(2024, 0, 2, 3, 4, 5));
  registry.seal();
  return registry;
}

// This helper runs one tool the way the dispatcher does; executor failures surface as thrown errors here.
async function run(registry: ToolRegistry, name: string, args: Record<string, unknown>): Promise<InvocationResult> {
  const check = registry.get(name)?.checkArguments(args);
  if (!check?.ok) {
    throw new Error(`arguments rejected for ${name}`);
  }
  return check.run({ toolName: name, requestId: 1, sessionId: 'session-1', logger: createCapturingLogger() });
}

async function text(registry: ToolRegistry, name: string, args: Record<string, unknown>): Promise<string> {
  const result = await run(registry, name, args);
  const first = result.content[0];
  return first?.type === 'text' ? first.text : '';
}

describe('calculator tools', () => {
  it('computes the basic operations as bare numbers', async () => {
    const registry = createRegistry();

    expect(await text(registry, 'add', { a: 2, b: 3 })).toBe('5');
    expect(await text(registry, 'subtract', { a: 2, b: 3 })).toBe('-1');
    expect(await text(registry, 'multiply', { a: 1.5, b: 4 })).toBe('6');
    expect(await text(registry, 'divide', { a: 7, b: 2 })).toBe('3.5');
    expect(await text(registry, 'power', { base: 3, exponent: 3 })).toBe('27');
    expect(await text(registry, 'sqrt', { number: 16 })).toBe('4');
    expect(await text(registry, 'factorial', { n: 0 })).toBe('1');
    expect(await text(registry, 'factorial', { n: 10 })).toBe('3628800');
  });

  it('fails on division by zero and negative inputs', async () => {
    const registry = createRegistry();

    await expect(run(registry, 'divide', { a: 1, b: 0 })).rejects.toMatchObject({ code: 'division_by_zero' });
    await expect(run(registry, 'sqrt', { number: -1 })).rejects.toMatchObject({ code: 'negative_input' });
    await expect(run(registry, 'factorial', { n: -3 })).rejects.toMatchObject({
      code: 'negative_input',
      message: 'Factorial is not defined for negative numbers.'
    });
  });

  it('rejects non-integer and oversized factorial inputs at validation', () => {
    const registry = createRegistry();
    const tool = registry.get('factorial');

    expect(tool?.checkArguments({ n: 2.5 }).ok).toBe(false);
    expect(tool?.checkArguments({ n: 171 }).ok).toBe(false);
    expect(tool?.checkArguments({ n: 170 }).ok).toBe(true);
  });

  it('multiplies up to n', () => {
    expect(factorial(1)).toBe(1);
    expect(factorial(5)).toBe(120);
  });
});

describe('greeting tools', () => {
  it('greets by name', async () => {
    const registry = createRegistry();

    expect(await text(registry, 'get_greeting', { name: 'Ada' })).toBe('Hello, Ada! Welcome to the toolgate server.');
    expect(registry.get('get_greeting')?.checkArguments({ name: '  ' }).ok).toBe(false);
  });

  it('reports the server clock in local time', async () => {
    const registry = createRegistry();

    expect(await text(registry, 'get_time', {})).toBe('The current server time is: 2024-01-02 03:04:05');
    expect(formatServerTime(new Date(2023, 11, 31, 23, 59, 0))).toBe('2023-12-31 23:59:00');
  });
});
