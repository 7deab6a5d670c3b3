export class DuplicateToolError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`tool '${toolName}' is already registered`);
    this.name = 'DuplicateToolError';
    this.toolName = toolName;
  }
}

export class UnknownToolError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`tool '${toolName}' not found`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

export type GenerationFailure = 'request_failed' | 'timeout' | 'aborted' | 'malformed_response';

export class GenerationError extends Error {
  readonly reason: GenerationFailure;

  constructor(reason: GenerationFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
    this.reason = reason;
  }
}

export class SessionError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionError';
    this.sessionId = sessionId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
