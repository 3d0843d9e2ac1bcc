// This module provides small web-style tools: a greeting and the server clock.

import { z } from 'zod';
import type { ToolRegistry } from '../mcp/registry.js';
import { textResult } from '../mcp/results.js';

export const greetingSchema = z.object({
  name: z.string().trim().min(1).max(200).describe('The name to greet')
});

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// This helper formats local time as YYYY-MM-DD HH:MM:SS.
export function formatServerTime(now: Date): string {
  const datePart = `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
  const timePart = `${pad2(now.getHours())}:${pad2(now.getMinutes())}:${pad2(now.getSeconds())}`;
  return `${datePart} ${timePart}`;
}

export function registerGreetingTools(registry: ToolRegistry, clock: () => Date = () => new Date()): void {
  registry.register({
    name: 'get_greeting',
    description: 'Get a greeting message',
    inputSchema: greetingSchema,
    execute: ({ name }) => textResult(`Hello, ${name}! Welcome to the toolgate server.`)
  });

  registry.register({
    name: 'get_time',
    description: 'Get the current server time',
    inputSchema: z.object({}),
    execute: () => textResult(`The current server time is: ${formatServerTime(clock())}`)
  });
}
