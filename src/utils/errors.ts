/**
 * @fileoverview Application error types.
 *
 * AppError carries a machine-readable code, a recoverability flag and
 * optional context. Recoverable errors are recorded and the run continues;
 * non-recoverable errors abort the current turn.
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** The model declined to answer (no text content). */
export class LlmRefusalError extends AppError {
  constructor(agent: string, context?: Record<string, unknown>) {
    super(`${agent}: model returned no text content`, 'llm_refusal', false, { agent, ...context });
    this.name = 'LlmRefusalError';
  }
}

/** A structured answer could not be parsed or had the wrong shape. */
export class StructuredOutputError extends AppError {
  constructor(agent: string, reason: string, context?: Record<string, unknown>) {
    super(`${agent}: invalid structured output (${reason})`, 'structured_output_invalid', false, {
      agent,
      ...context,
    });
    this.name = 'StructuredOutputError';
  }
}

export class ToolErrorBudgetExceededError extends AppError {
  constructor(taskId: number, errorCount: number) {
    super(
      `Task ${taskId} exceeded the tool error budget (${errorCount} errors)`,
      'tool_error_budget_exceeded',
      false,
      { taskId, errorCount }
    );
    this.name = 'ToolErrorBudgetExceededError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(taskId: number, from: string, to: string) {
    super(`Task ${taskId}: invalid status transition ${from} -> ${to}`, 'invalid_task_transition', false, {
      taskId,
      from,
      to,
    });
    this.name = 'InvalidTransitionError';
  }
}

/** Tool call arguments were not valid JSON or did not match the schema. */
export class ToolArgumentsError extends AppError {
  constructor(toolName: string, reason: string) {
    super(`Invalid arguments for ${toolName}: ${reason}`, 'tool_arguments_invalid', true, { toolName });
    this.name = 'ToolArgumentsError';
  }
}

export class UnknownToolError extends AppError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, 'unknown_tool', true, { toolName });
    this.name = 'UnknownToolError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'configuration_error', false);
    this.name = 'ConfigurationError';
  }
}

export class SessionNotFoundError extends AppError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'session_not_found', false, { sessionId });
    this.name = 'SessionNotFoundError';
  }
}

/** The session's schedule is complete; it takes no further messages. */
export class SessionLockedError extends AppError {
  constructor(sessionId: string) {
    super('Schedule is complete for this session', 'session_complete', false, { sessionId });
    this.name = 'SessionLockedError';
  }
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
