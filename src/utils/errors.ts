import { ZodError } from "zod";

export const HTTP_STATUS = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
} as const;

export type ErrorCode =
  | "BAD_REQUEST"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFIGURATION_ERROR"
  | "STORE_UNAVAILABLE"
  | "STORE_LOCKED"
  | "UPSTREAM_ERROR"
  | "SERVICE_UNAVAILABLE"
  | "INTERNAL_SERVER_ERROR";

interface AppErrorOptions {
  statusCode?: number;
  code?: ErrorCode;
  details?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, options?: AppErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = options?.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    this.code = options?.code ?? "INTERNAL_SERVER_ERROR";
    this.details = options?.details;
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation error", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.UNPROCESSABLE_ENTITY, code: "VALIDATION_ERROR", details });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.NOT_FOUND, code: "NOT_FOUND", details });
  }
}

export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: unknown) {
    super(message, { code: "CONFIGURATION_ERROR", details });
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = "Service unavailable", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE, code: "SERVICE_UNAVAILABLE", details });
  }
}

export type StoreOperation = "append" | "update" | "remove" | "load" | "compact";

export function describeErrorCause(error: unknown): string {
  if (error instanceof Error) {
    if ("code" in error && typeof error.code === "string") {
      return `${error.code}: ${error.message}`;
    }
    return error.message;
  }
  return String(error);
}

export class StoreUnavailableError extends AppError {
  public readonly operation: StoreOperation;

  constructor(operation: StoreOperation, cause: unknown) {
    const reason = describeErrorCause(cause);
    super(`Notification store ${operation} failed: ${reason}`, {
      statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE,
      code: "STORE_UNAVAILABLE",
      details: { operation, reason },
    });
    this.operation = operation;
  }
}

export class StoreLockedError extends AppError {
  constructor(lockPath: string, ownerPid: number) {
    super(`Notification store is locked by running process ${ownerPid}`, {
      statusCode: HTTP_STATUS.CONFLICT,
      code: "STORE_LOCKED",
      details: { lockPath, ownerPid },
    });
  }
}

export class UpstreamError extends AppError {
  constructor(message = "Upstream request failed", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.BAD_GATEWAY, code: "UPSTREAM_ERROR", details });
  }
}

export interface ApiErrorResponse {
  error: {
    message: string;
    code: ErrorCode;
    statusCode: number;
    details?: unknown;
    requestId?: string;
  };
}

export function formatError(error: unknown, requestId?: string): ApiErrorResponse {
  if (error instanceof AppError) {
    return {
      error: {
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        details: error.details,
        requestId,
      },
    };
  }

  if (error instanceof ZodError) {
    const details = error.flatten();
    return {
      error: {
        message: "Validation error",
        code: "VALIDATION_ERROR",
        statusCode: HTTP_STATUS.UNPROCESSABLE_ENTITY,
        details,
        requestId,
      },
    };
  }

  const fallbackMessage = error instanceof Error ? error.message : "Internal Server Error";

  return {
    error: {
      message: fallbackMessage || "Internal Server Error",
      code: "INTERNAL_SERVER_ERROR",
      statusCode: HTTP_STATUS.INTERNAL_SERVER_ERROR,
      requestId,
    },
  };
}
