/**
 * Error taxonomy for the conversation engine.
 *
 * Every failure that reaches a caller is an AgentError carrying one of the
 * codes below. GENERATOR_OUTPUT_MALFORMED is only ever raised and handled
 * inside the turn pipeline.
 */

export const AgentErrorCodes = {
  /** Agent id unknown to both the registry and the durable log */
  NOT_FOUND: 'NOT_FOUND',
  /** Caller sent something unusable (empty message, missing ids) */
  BAD_INPUT: 'BAD_INPUT',
  /** Agent exists but cannot be operated (e.g. no story reference) */
  INVALID_AGENT_STATE: 'INVALID_AGENT_STATE',
  /** Generator or network failure */
  UNAVAILABLE: 'UNAVAILABLE',
  /** Generator replied with something that does not decode */
  GENERATOR_OUTPUT_MALFORMED: 'GENERATOR_OUTPUT_MALFORMED',
} as const;

export type AgentErrorCode = (typeof AgentErrorCodes)[keyof typeof AgentErrorCodes];

export interface AgentErrorData {
  code: AgentErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly details?: Record<string, unknown>;
  /** ISO 8601 */
  readonly timestamp: string;

  constructor(data: AgentErrorData) {
    super(data.message);
    this.name = 'AgentError';
    this.code = data.code;
    this.details = data.details;
    this.timestamp = new Date().toISOString();
    if (data.cause !== undefined) {
      this.cause = data.cause;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function notFound(message: string, details?: Record<string, unknown>): AgentError {
  return new AgentError({ code: AgentErrorCodes.NOT_FOUND, message, details });
}

export function badInput(message: string, details?: Record<string, unknown>): AgentError {
  return new AgentError({ code: AgentErrorCodes.BAD_INPUT, message, details });
}

export function emptyInput(): AgentError {
  return badInput('Message must not be empty', { reason: 'empty_input' });
}

export function invalidAgentState(message: string, details?: Record<string, unknown>): AgentError {
  return new AgentError({ code: AgentErrorCodes.INVALID_AGENT_STATE, message, details });
}

export function unavailable(message: string, cause?: unknown): AgentError {
  return new AgentError({ code: AgentErrorCodes.UNAVAILABLE, message, cause });
}

export function generatorOutputMalformed(message: string, details?: Record<string, unknown>): AgentError {
  return new AgentError({ code: AgentErrorCodes.GENERATOR_OUTPUT_MALFORMED, message, details });
}

const HTTP_STATUS: Record<AgentErrorCode, number> = {
  NOT_FOUND: 404,
  BAD_INPUT: 400,
  INVALID_AGENT_STATE: 500,
  UNAVAILABLE: 503,
  GENERATOR_OUTPUT_MALFORMED: 500,
};

export function httpStatusFor(error: AgentError): number {
  return HTTP_STATUS[error.code];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
