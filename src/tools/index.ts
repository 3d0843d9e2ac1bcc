// This module registers the built-in tool providers exposed by the server entrypoint.

import type { ToolRegistry } from '../mcp/registry.js';
import { registerCalculatorTools } from './calculator.js';
import { registerGreetingTools } from './greeting.js';

export function registerBuiltinTools(registry: ToolRegistry): void {
  registerCalculatorTools(registry);
  registerGreetingTools(registry);
}
