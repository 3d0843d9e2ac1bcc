// This module translates discovered JSON Schema input definitions into parameter lists and zod validators.

import { z } from 'zod';
import type { JsonSchemaProperty, ToolInputSchema } from '../types/mcp.js';

export interface ToolParameter {
  name: string;
  type: string;
  required: boolean;
  description?: string;
}

interface ObjectSchemaLike {
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
}

function declaredTypes(property: JsonSchemaProperty): string[] {
  if (property.type === undefined) {
    return [];
  }
  return Array.isArray(property.type) ? property.type : [property.type];
}

// This helper builds the validator for one declared JSON type.
function typeValidator(type: string, property: JsonSchemaProperty): z.ZodTypeAny {
  switch (type) {
    case 'string':
      return z.string();
    case 'number':
      return z.number();
    case 'integer':
      return z.number().int();
    case 'boolean':
      return z.boolean();
    case 'null':
      return z.null();
    case 'array':
      return z.array(property.items ? propertyValidator(property.items) : z.unknown());
    case 'object':
      return property.properties ? objectValidator(property) : z.record(z.unknown());
    default:
      return z.unknown();
  }
}

function propertyValidator(property: JsonSchemaProperty): z.ZodTypeAny {
  const allowed = property.enum;
  if (allowed) {
    return z.unknown().refine((value) => allowed.some((candidate) => candidate === value), {
      message: `Expected one of ${JSON.stringify(allowed)}`
    });
  }

  const validators = declaredTypes(property).map((type) => typeValidator(type, property));
  if (validators.length === 0) {
    return z.unknown();
  }

  return validators.reduce((union, validator) => union.or(validator));
}

// Unknown keys pass through untouched; the server decides whether it accepts them.
function objectValidator(schema: ObjectSchemaLike): z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown> {
  const required = new Set(schema.required ?? []);
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [name, property] of Object.entries(schema.properties ?? {})) {
    const validator = propertyValidator(property);
    shape[name] = required.has(name)
      ? validator.refine((value: unknown) => value !== undefined, { message: 'Required' })
      : validator.optional();
  }

  for (const name of required) {
    if (!(name in shape)) {
      shape[name] = z.unknown().refine((value) => value !== undefined, { message: 'Required' });
    }
  }

  return z.object(shape).passthrough();
}

export function buildArgumentsValidator(schema: ToolInputSchema): z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown> {
  return objectValidator(schema);
}

// This helper lists the top-level parameters in declaration order for tool selection by an upstream caller.
export function describeParameters(schema: ToolInputSchema): ToolParameter[] {
  const required = new Set(schema.required ?? []);

  return Object.entries(schema.properties ?? {}).map(([name, property]) => {
    const types = declaredTypes(property);
    const parameter: ToolParameter = {
      name,
      type: types.length > 0 ? types.join('|') : 'any',
      required: required.has(name)
    };

    if (property.description !== undefined) {
      parameter.description = property.description;
    }

    return parameter;
  });
}
