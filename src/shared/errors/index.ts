/**
 * Shared Error Classes
 *
 * Every error the engine raises is an AppError so API handlers can map it to a
 * status code without inspecting messages.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Malformed coordinate, location key or request parameter
 */
export class ValidationError extends AppError {
  constructor(message: string, public field?: string) {
    super(message, 400, "VALIDATION_ERROR")
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = "Resource", public cause?: unknown) {
    super(`${resource} not found`, 404, "NOT_FOUND")
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, "CONFIGURATION_ERROR")
  }
}

/**
 * Transport failure talking to a provider (DNS, reset, refused...)
 */
export class NetworkError extends AppError {
  constructor(message: string, public cause?: unknown) {
    super(message, 502, "NETWORK_ERROR")
  }
}

/**
 * Provider answered, but the payload could not be parsed or failed validation
 */
export class DecodeError extends AppError {
  constructor(message: string, public cause?: unknown) {
    super(message, 502, "DECODE_ERROR")
  }
}

/**
 * Provider answered with a non-2xx status
 */
export class ProviderError extends AppError {
  constructor(message: string, public status?: number) {
    super(message, 502, "PROVIDER_ERROR")
  }
}

export class TimeoutError extends AppError {
  constructor(message: string = "Operation timed out") {
    super(message, 504, "TIMEOUT")
  }
}

/**
 * Errors a full fetch may recover from by serving stale cache
 */
export function isRecoverableFetchError(error: unknown): error is AppError {
  return (
    error instanceof NetworkError ||
    error instanceof DecodeError ||
    error instanceof ProviderError ||
    error instanceof TimeoutError
  )
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
