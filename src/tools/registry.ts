import { z } from "zod";
import { describeIssues } from "../planning/schemas";

export type ToolContext = { signal: AbortSignal };

export type ParamHint = { name: string; type: string; required: boolean; description?: string };

export type ToolDescription = { name: string; description: string; parameters: ParamHint[] };

/** Arguments that passed validation, bound to the tool's invoker. */
export type PreparedCall = {
  readonly toolName: string;
  readonly args: Readonly<Record<string, unknown>>;
  execute(ctx: ToolContext): Promise<unknown>;
};

export type PrepareResult = { ok: true; call: PreparedCall } | { ok: false; error: string };

export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  /** Schema a generated argument object must satisfy. */
  readonly parameters: z.ZodTypeAny;
  describe(): ToolDescription;
  prepare(rawArgs: unknown): PrepareResult;
}

export type ToolDefinition<Shape extends z.ZodRawShape> = {
  name: string;
  description: string;
  parameters: z.ZodObject<Shape, "strict">;
  /** Cross-field checks; returns a message when the arguments are inconsistent. */
  check?: (args: z.infer<z.ZodObject<Shape, "strict">>) => string | undefined;
  invoke: (args: z.infer<z.ZodObject<Shape, "strict">>, ctx: ToolContext) => Promise<unknown>;
};

function typeLabel(t: z.ZodTypeAny): string {
  if (t instanceof z.ZodOptional || t instanceof z.ZodNullable) return typeLabel(t.unwrap());
  if (t instanceof z.ZodDefault) return typeLabel(t.removeDefault());
  if (t instanceof z.ZodEffects) return typeLabel(t.innerType());
  if (t instanceof z.ZodEnum) return t.options.map((o: string) => JSON.stringify(o)).join(" | ");
  if (t instanceof z.ZodNumber) return t.isInt ? "integer" : "number";
  if (t instanceof z.ZodString) return "string";
  if (t instanceof z.ZodBoolean) return "boolean";
  return "value";
}

export function defineTool<Shape extends z.ZodRawShape>(def: ToolDefinition<Shape>): RegisteredTool {
  const shape: z.ZodRawShape = def.parameters.shape;
  const hints: ParamHint[] = Object.entries(shape).map(([name, field]) => ({
    name,
    type: typeLabel(field),
    required: !field.isOptional(),
    description: field.description,
  }));
  return {
    name: def.name,
    description: def.description,
    parameters: def.parameters,
    describe: () => ({ name: def.name, description: def.description, parameters: hints }),
    prepare(rawArgs) {
      const parsed = def.parameters.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        return { ok: false, error: describeIssues(parsed.error) };
      }
      const args = parsed.data;
      const problem = def.check?.(args);
      if (problem) {
        return { ok: false, error: problem };
      }
      return {
        ok: true,
        call: { toolName: def.name, args, execute: (ctx) => def.invoke(args, ctx) },
      };
    },
  };
}

/** Immutable name → tool map, built once at startup. */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, RegisteredTool>;

  private constructor(tools: ReadonlyMap<string, RegisteredTool>) {
    this.tools = tools;
  }

  static from(tools: readonly RegisteredTool[]): ToolRegistry {
    const map = new Map<string, RegisteredTool>();
    for (const tool of tools) {
      if (!tool.name.trim()) throw new Error("Tool name must be a non-empty string");
      if (map.has(tool.name)) throw new Error(`Duplicate tool name: ${tool.name}`);
      map.set(tool.name, tool);
    }
    return new ToolRegistry(map);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  describe(): ToolDescription[] {
    return Array.from(this.tools.values(), (t) => t.describe());
  }
}
