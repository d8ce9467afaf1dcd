export type ControlPlaneErrorCode =
  | "tool_execution_failed"
  | "unresolved_function"
  | "configuration_missing";

export class ToolExecutionError extends Error {
  public readonly code = "tool_execution_failed" satisfies ControlPlaneErrorCode;
  public readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class UnresolvedFunctionError extends Error {
  public readonly code = "unresolved_function" satisfies ControlPlaneErrorCode;
  public readonly functionName: string;

  constructor(functionName: string) {
    super(`No handler registered for function "${functionName}"`);
    this.name = "UnresolvedFunctionError";
    this.functionName = functionName;
  }
}

export class ConfigurationMissingError extends Error {
  public readonly code = "configuration_missing" satisfies ControlPlaneErrorCode;
  public readonly group: string;
  public readonly key: string;

  constructor(group: string, key: string) {
    super(`Configuration not found for ${key}`);
    this.name = "ConfigurationMissingError";
    this.group = group;
    this.key = key;
  }

  toJSON() {
    return {
      error: "configuration_missing",
      message: this.message,
      group: this.group,
      key: this.key,
    };
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
