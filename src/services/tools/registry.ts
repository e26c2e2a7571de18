import { z } from 'zod';
import { ArgDescriptor, ToolCallResult, ToolContext, ToolName, ToolSchema } from '../../types/tools';

export type ToolArgs<Shape extends z.ZodRawShape> = z.objectOutputType<Shape, z.ZodTypeAny, 'strip'>;

export interface ToolDefinition<Shape extends z.ZodRawShape> {
  name: ToolName;
  description: string;
  /** Primitive fields only: string, number, boolean or string enum, optionally wrapped in optional(). */
  args: Shape;
  handler: (args: ToolArgs<Shape>, context: ToolContext) => Promise<ToolCallResult>;
}

export type BoundCall =
  | { ok: true; run: () => Promise<ToolCallResult> }
  | { ok: false; issues: string[] };

/** A tool with its argument types erased behind validation. */
export interface RegisteredTool {
  name: ToolName;
  schema: ToolSchema;
  bind(rawArgs: Record<string, unknown>, context: ToolContext): BoundCall;
}

export function describeArg(schema: z.ZodTypeAny): ArgDescriptor {
  let inner: z.ZodTypeAny = schema;
  let required = true;
  while (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable || inner instanceof z.ZodDefault) {
    required = false;
    inner = inner instanceof z.ZodDefault ? inner.removeDefault() : inner.unwrap();
  }
  const description = schema.description ?? inner.description;

  if (inner instanceof z.ZodNumber) return { type: 'number', required, description };
  if (inner instanceof z.ZodBoolean) return { type: 'boolean', required, description };
  if (inner instanceof z.ZodEnum) {
    const options: unknown[] = inner.options;
    return { type: 'string', required, description, enum: options.map(String) };
  }
  return { type: 'string', required, description };
}

export function toToolSchema(name: ToolName, description: string, shape: z.ZodRawShape): ToolSchema {
  const properties: ToolSchema['inputSchema']['properties'] = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries(shape)) {
    const arg = describeArg(field);
    properties[key] = {
      type: arg.type,
      ...(arg.description ? { description: arg.description } : {}),
      ...(arg.enum ? { enum: arg.enum } : {}),
    };
    if (arg.required) required.push(key);
  }

  return { name, description, inputSchema: { type: 'object', properties, required } };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join('.') || '(arguments)';
    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      return `${field}: missing required argument`;
    }
    return `${field}: ${issue.message}`;
  });
}

export function defineTool<Shape extends z.ZodRawShape>(definition: ToolDefinition<Shape>): RegisteredTool {
  const parser = z.object(definition.args);
  const schema = toToolSchema(definition.name, definition.description, definition.args);

  return {
    name: definition.name,
    schema,
    bind(rawArgs, context) {
      const parsed = parser.safeParse(rawArgs);
      if (!parsed.success) {
        return { ok: false, issues: formatIssues(parsed.error) };
      }
      const args = parsed.data;
      return { ok: true, run: () => definition.handler(args, context) };
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: RegisteredTool[]) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool registration: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  names(): ToolName[] {
    return [...this.tools.values()].map((tool) => tool.name);
  }

  schemas(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => tool.schema);
  }
}
