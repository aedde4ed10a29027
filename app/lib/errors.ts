/**
 * Error taxonomy shared by the service clients and the routes.
 */

/**
 * A required environment variable is missing. Fatal at startup.
 */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string) {
    super(
      `Missing required environment variable: ${variable}. ` +
        `Check .env.example for documentation.`
    );
    this.name = "ConfigError";
    this.variable = variable;
  }
}

export type ServiceErrorKind = "auth" | "network" | "not_found" | "unavailable";

export interface ServiceError {
  kind: ServiceErrorKind;
  message: string;
  status?: number;
}

/**
 * Result type returned by every external service call.
 */
export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: ServiceError };

export function ok<T>(data: T): ServiceResult<T> {
  return { success: true, data };
}

export function fail<T = never>(
  kind: ServiceErrorKind,
  message: string,
  status?: number
): ServiceResult<T> {
  return {
    success: false,
    error: status === undefined ? { kind, message } : { kind, message, status },
  };
}

/**
 * Loader-friendly form of a result: exactly one of data and error is set.
 */
export type Loadable<T> =
  | { data: T; error: null }
  | { data: null; error: ServiceError };

export function toLoadable<T>(result: ServiceResult<T>): Loadable<T> {
  return result.success
    ? { data: result.data, error: null }
    : { data: null, error: result.error };
}

/**
 * Map an HTTP status to the error kind the routes react to.
 */
export function kindForStatus(status: number): ServiceErrorKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 404) return "not_found";
  return "network";
}

/**
 * Convert a thrown fetch error into a network failure.
 */
export function fromFetchError<T = never>(error: unknown): ServiceResult<T> {
  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return fail("network", "Request timed out");
    }
    return fail("network", error.message);
  }
  return fail("network", "Unknown error occurred");
}

/**
 * User-facing message for a failed call.
 */
export function describeError(error: ServiceError): string {
  switch (error.kind) {
    case "auth":
      return error.message || "Your session is no longer valid. Please sign in again.";
    case "not_found":
      return "Nothing found.";
    case "unavailable":
      return error.message || "This feature is not configured.";
    case "network":
      return `Something went wrong talking to an external service: ${error.message}`;
  }
}
