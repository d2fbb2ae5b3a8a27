import { z, type AnyZodObject, type ZodTypeAny } from 'zod';
import {
  isRecord,
  isStringArray,
  jsonObjectSchemaSchema,
  LingshuError,
  type FunctionToolSpec,
  type JsonObjectSchema,
  type JsonSchema,
  type RemoteTool,
  type ToolInputSchema,
  type ToolParameter,
  type ToolParameterType,
} from '@lingshu/shared';

function parameterType(schema: ZodTypeAny): ToolParameterType {
  if (schema instanceof z.ZodString || schema instanceof z.ZodEnum) return 'string';
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodArray) return 'array';
  if (schema instanceof z.ZodObject || schema instanceof z.ZodRecord) return 'object';
  throw new LingshuError(`Unsupported tool parameter schema: ${schema.constructor.name}`);
}

function describeParameter(schema: ZodTypeAny): ToolParameter {
  const required = !schema.isOptional();
  let description = schema.description;
  let defaultValue: unknown;
  let current = schema;

  // Peel optional/default/nullable wrappers down to the value type
  for (;;) {
    if (current instanceof z.ZodDefault) {
      defaultValue = current._def.defaultValue();
      current = current.removeDefault();
    } else if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else {
      break;
    }
    description ??= current.description;
  }

  const parameter: ToolParameter = { type: parameterType(current), required };
  if (description) parameter.description = description;
  if (defaultValue !== undefined) parameter.default = defaultValue;
  if (current instanceof z.ZodEnum && isStringArray(current.options)) parameter.enum = [...current.options];
  if (current instanceof z.ZodArray) parameter.items = { type: parameterType(current.element) };
  return parameter;
}

/**
 * Reads the declared parameter mapping (name → type, description,
 * required-ness, default) out of a tool's zod input object.
 */
export function describeInputSchema(schema: AnyZodObject): ToolInputSchema {
  const mapping: ToolInputSchema = {};
  for (const [name, field] of Object.entries<ZodTypeAny>(schema.shape)) {
    mapping[name] = describeParameter(field);
  }
  return mapping;
}

/** Renders a declared parameter mapping as the JSON Schema advertised over MCP. */
export function toJsonSchema(inputSchema: ToolInputSchema): JsonObjectSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const [name, parameter] of Object.entries(inputSchema)) {
    const property: JsonSchema = { type: parameter.type };
    if (parameter.description) property.description = parameter.description;
    if (parameter.enum) property.enum = parameter.enum;
    if (parameter.items) property.items = { type: parameter.items.type };
    if (parameter.default !== undefined) property.default = parameter.default;
    properties[name] = property;
    if (parameter.required) required.push(name);
  }

  return { type: 'object', properties, required, additionalProperties: false };
}

/**
 * Converts a JSON Schema object to a Zod schema.
 * Handles the common types used by MCP tools.
 */
export function jsonSchemaToZod(schema: JsonSchema): ZodTypeAny {
  const type = typeof schema.type === 'string' ? schema.type : undefined;

  switch (type) {
    case 'string': {
      if (isStringArray(schema.enum)) {
        const [first, ...rest] = schema.enum;
        if (first !== undefined) return z.enum([first, ...rest]);
      }
      let s = z.string();
      const { minLength, maxLength } = schema;
      if (typeof minLength === 'number') s = s.min(minLength);
      if (typeof maxLength === 'number') s = s.max(maxLength);
      return s;
    }
    case 'number':
    case 'integer': {
      let n = type === 'integer' ? z.number().int() : z.number();
      const { minimum, maximum } = schema;
      if (typeof minimum === 'number') n = n.min(minimum);
      if (typeof maximum === 'number') n = n.max(maximum);
      return n;
    }
    case 'boolean':
      return z.boolean();
    case 'array': {
      const items = schema.items;
      return z.array(isRecord(items) ? jsonSchemaToZod(items) : z.unknown());
    }
    case 'object': {
      const properties = schema.properties;
      if (!isRecord(properties)) {
        return z.record(z.unknown());
      }

      const required = isStringArray(schema.required) ? schema.required : [];
      const shape: Record<string, ZodTypeAny> = {};
      for (const [key, propSchema] of Object.entries(properties)) {
        const fieldSchema = jsonSchemaToZod(isRecord(propSchema) ? propSchema : {});
        shape[key] = required.includes(key) ? fieldSchema : fieldSchema.optional();
      }

      const object = z.object(shape);
      return schema.additionalProperties === false ? object.strict() : object.passthrough();
    }
    default:
      return z.unknown();
  }
}

/** Normalizes a tool entry from an MCP `tools/list` response. */
export function toRemoteTool(tool: { name: string; description?: string; inputSchema: unknown }): RemoteTool {
  const parsed = jsonObjectSchemaSchema.safeParse(tool.inputSchema);
  if (!parsed.success) {
    throw new LingshuError(`Tool ${tool.name} advertises an invalid input schema`);
  }

  return {
    name: tool.name,
    description: tool.description ?? `MCP tool: ${tool.name}`,
    inputSchema: parsed.data,
  };
}

/** Shapes a discovered tool as an OpenAI-style function-calling entry. */
export function toFunctionToolSpec(tool: RemoteTool): FunctionToolSpec {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: tool.inputSchema.type,
        properties: { ...tool.inputSchema.properties },
        required: tool.inputSchema.required ?? [],
      },
    },
  };
}
