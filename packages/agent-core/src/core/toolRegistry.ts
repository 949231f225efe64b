import { ToolExecutionError, ValidationRuntimeError } from "./errors";
import { ToolArgs, ToolExecutor } from "./contracts";

export interface ToolValidationIssue {
  field: string;
  message: string;
}

export interface ToolMetadata {
  name: string;
  description?: string;
}

export interface ToolRegistration {
  name: string;
  description?: string;
  validateArgs: (args: ToolArgs) => ToolValidationIssue[];
  execute: (args: ToolArgs) => unknown;
}

export class ToolRegistry implements ToolExecutor {
  private readonly tools = new Map<string, ToolRegistration>();

  registerTool(tool: ToolRegistration): void {
    if (!tool.name || typeof tool.name !== "string") {
      throw new ValidationRuntimeError("Invalid tool registration: name is required");
    }
    if (typeof tool.validateArgs !== "function") {
      throw new ValidationRuntimeError(
        `Invalid tool registration for ${tool.name}: validateArgs is required`
      );
    }
    if (typeof tool.execute !== "function") {
      throw new ValidationRuntimeError(
        `Invalid tool registration for ${tool.name}: execute handler is required`
      );
    }
    if (this.tools.has(tool.name)) {
      throw new ValidationRuntimeError(`Duplicate tool registration: ${tool.name}`);
    }

    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listTools(): ToolMetadata[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description
    }));
  }

  async execute(name: string, args: ToolArgs): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ValidationRuntimeError(`Unknown tool: ${name}`);
    }

    const issues = tool.validateArgs(args);
    if (!Array.isArray(issues)) {
      throw new ValidationRuntimeError(`Invalid tool validator return value: ${name}`);
    }
    if (issues.length > 0) {
      const detail = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
      throw new ValidationRuntimeError(`Invalid args for tool ${name}: ${detail}`);
    }

    try {
      return await tool.execute(args);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ToolExecutionError(name, `Tool ${name} failed: ${message}`, false);
    }
  }
}
