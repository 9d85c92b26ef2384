import type { z } from 'zod';
import type { Observation } from '../types/analysis.types.js';
import { errorMessage, isFatal } from '../errors/base.js';
import { InvalidArgumentsError, ToolError, UnknownToolError } from '../errors/tool.js';

export interface ToolContext {
  signal?: AbortSignal;
}

export type ToolHandler<S extends z.ZodTypeAny> = (
  args: z.infer<S>,
  context: ToolContext,
) => Promise<Observation>;

export type ToolResult = { ok: true; value: Observation } | { ok: false; error: ToolError };

export interface ToolDescriptor {
  name: string;
  description: string;
}

interface RegisteredTool extends ToolDescriptor {
  run(args: unknown, context: ToolContext): Promise<ToolResult>;
}

/**
 * Closed set of named tools. Arguments are parsed with the tool's schema before
 * the handler runs, and every failure comes back as a ToolError result rather
 * than a rejection.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<S extends z.ZodTypeAny>(
    name: string,
    inputSchema: S,
    handler: ToolHandler<S>,
    description = '',
  ): void {
    if (this.tools.has(name)) {
      throw new Error(`Tool already registered: ${name}`);
    }
    this.tools.set(name, {
      name,
      description,
      run: async (args, context) => {
        const parsed = inputSchema.safeParse(args);
        if (!parsed.success) {
          const issues = parsed.error.issues.map(
            (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
          );
          return { ok: false, error: new InvalidArgumentsError(name, issues) };
        }
        try {
          return { ok: true, value: await handler(parsed.data, context) };
        } catch (err) {
          return { ok: false, error: toToolError(name, err) };
        }
      },
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  async invoke(name: string, args: unknown, context: ToolContext = {}): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) return { ok: false, error: new UnknownToolError(name) };
    return tool.run(args, context);
  }
}

function toToolError(toolName: string, err: unknown): ToolError {
  if (err instanceof ToolError) return err;
  const message = `${toolName} failed: ${errorMessage(err)}`;
  return isFatal(err)
    ? new ToolError(message, 'COLLABORATOR_UNAVAILABLE', toolName, err)
    : new ToolError(message, 'TOOL_FAILED', toolName, err);
}
