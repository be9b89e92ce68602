import type { RequestedSlot } from "./schemas";

export enum AssistantErrorCode {
  ROUTING_UNAVAILABLE = "ROUTING_UNAVAILABLE",
  VALIDATION = "VALIDATION",
  CONFLICT = "CONFLICT",
  TOOL_MISUSE = "TOOL_MISUSE",
  MALFORMED_TOOL_CALL = "MALFORMED_TOOL_CALL",
  INVALID_TRANSITION = "INVALID_TRANSITION",
  NOT_FOUND = "NOT_FOUND",
  CONFIG = "CONFIG"
}

export interface AssistantErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class AssistantError extends Error {
  readonly code: AssistantErrorCode;
  readonly context: Record<string, unknown>;

  constructor(message: string, code: AssistantErrorCode, options: AssistantErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AssistantError";
    this.code = code;
    this.context = options.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {})
    };
  }
}

export class RoutingUnavailableError extends AssistantError {
  constructor(message: string, options: AssistantErrorOptions = {}) {
    super(message, AssistantErrorCode.ROUTING_UNAVAILABLE, options);
    this.name = "RoutingUnavailableError";
  }

  static from(error: unknown, context?: Record<string, unknown>): RoutingUnavailableError {
    if (error instanceof RoutingUnavailableError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new RoutingUnavailableError(message, { cause: error, ...(context ? { context } : {}) });
  }
}

export class ValidationError extends AssistantError {
  readonly missingFields: readonly string[];

  constructor(message: string, missingFields: readonly string[] = [], options: AssistantErrorOptions = {}) {
    super(message, AssistantErrorCode.VALIDATION, options);
    this.name = "ValidationError";
    this.missingFields = missingFields;
  }
}

export type ReservationConflict = {
  reservationId: string;
  resourceId: string;
  startAt: Date;
  endAt: Date;
};

export class ConflictError extends AssistantError {
  readonly conflicts: readonly ReservationConflict[];
  readonly alternatives: readonly RequestedSlot[];

  constructor(
    message: string,
    conflicts: readonly ReservationConflict[],
    alternatives: readonly RequestedSlot[] = [],
    options: AssistantErrorOptions = {}
  ) {
    super(message, AssistantErrorCode.CONFLICT, options);
    this.name = "ConflictError";
    this.conflicts = conflicts;
    this.alternatives = alternatives;
  }
}

export class ToolMisuseError extends AssistantError {
  constructor(message: string, options: AssistantErrorOptions = {}) {
    super(message, AssistantErrorCode.TOOL_MISUSE, options);
    this.name = "ToolMisuseError";
  }
}

export class MalformedToolCallError extends AssistantError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options: AssistantErrorOptions = {}) {
    super(message, AssistantErrorCode.MALFORMED_TOOL_CALL, options);
    this.name = "MalformedToolCallError";
    this.toolName = toolName;
  }
}

export class InvalidTransitionError extends AssistantError {
  constructor(from: string, to: string, options: AssistantErrorOptions = {}) {
    super(`Cannot move reservation from ${from} to ${to}`, AssistantErrorCode.INVALID_TRANSITION, options);
    this.name = "InvalidTransitionError";
  }
}

export class NotFoundError extends AssistantError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, AssistantErrorCode.NOT_FOUND, { context: { entity, id } });
    this.name = "NotFoundError";
  }
}

export class ConfigError extends AssistantError {
  constructor(message: string, options: AssistantErrorOptions = {}) {
    super(message, AssistantErrorCode.CONFIG, options);
    this.name = "ConfigError";
  }
}
