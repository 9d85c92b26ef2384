import { SifterError } from './base.js';

export type ToolErrorCode =
  | 'UNKNOWN_TOOL'
  | 'INVALID_ARGUMENTS'
  | 'TOOL_FAILED'
  | 'COLLABORATOR_UNAVAILABLE';

export class ToolError extends SifterError {
  override readonly fatal: boolean;

  constructor(
    message: string,
    public readonly toolCode: ToolErrorCode,
    public readonly toolName: string,
    cause?: unknown,
  ) {
    super(message, toolCode, cause);
    this.fatal = toolCode === 'COLLABORATOR_UNAVAILABLE';
  }
}

export class UnknownToolError extends ToolError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, 'UNKNOWN_TOOL', toolName);
  }
}

export class InvalidArgumentsError extends ToolError {
  constructor(
    toolName: string,
    public readonly issues: string[],
  ) {
    super(`Invalid arguments for ${toolName}: ${issues.join('; ')}`, 'INVALID_ARGUMENTS', toolName);
  }
}
