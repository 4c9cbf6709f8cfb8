/**
 * Error taxonomy shared by the API client and the session runner.
 *
 * - NetworkError: transient, retried by the client's RetryPolicy
 * - AuthError: fatal for the affected session only
 * - GameLogicError: the game refused the action; never retried
 * - MaintenanceError: backend in maintenance mode; the runner backs off
 * - ConfigError: malformed settings; the session (or process) refuses to start
 */
export class GameApiError extends Error {
  constructor(message: string, public readonly endpoint: string) {
    super(message);
    this.name = "GameApiError";
  }
}

export class NetworkError extends GameApiError {
  constructor(endpoint: string, message: string, public readonly status: number | null = null) {
    super(`${endpoint}: ${message}`, endpoint);
    this.name = "NetworkError";
  }
}

export class AuthError extends GameApiError {
  constructor(endpoint: string, message: string, public readonly status: number | null = null) {
    super(`${endpoint}: ${message}`, endpoint);
    this.name = "AuthError";
  }
}

export class GameLogicError extends GameApiError {
  constructor(endpoint: string, public readonly code: string, public readonly status: number) {
    super(`${endpoint}: ${code}`, endpoint);
    this.name = "GameLogicError";
  }
}

export class MaintenanceError extends GameApiError {
  constructor(endpoint: string) {
    super(`${endpoint}: server is in maintenance mode`, endpoint);
    this.name = "MaintenanceError";
  }
}

export class RetryExhaustedError extends NetworkError {
  constructor(endpoint: string, public readonly attempts: number, public readonly lastError: NetworkError) {
    super(endpoint, `gave up after ${attempts} attempts (${lastError.message})`, lastError.status);
    this.name = "RetryExhaustedError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly key?: string) {
    super(key ? `${key}: ${message}` : message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
