/**
 * Describes recoverable upstream failures that are reported inside query results instead of thrown.
 */
export type AppBoundaryErrorCode =
  | "non_success_status"
  | "invalid_json"
  | "malformed_response";

/**
 * Describes a normalized boundary failure while preserving which upstream call produced it.
 */
export type AppBoundaryError = {
  source: "suggestions" | "description";
  code: AppBoundaryErrorCode;
  message: string;
  httpStatus?: number;
  cause?: unknown;
};

export type TransportFailureCode = "timeout" | "aborted" | "transport_error";

/**
 * Raised when a request never produced an HTTP response. Not recovered at call sites.
 */
export class UpstreamTransportError extends Error {
  constructor(
    readonly code: TransportFailureCode,
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "UpstreamTransportError";
  }
}

export class ConfigurationError extends Error {
  constructor(message = "Invalid configuration", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class MissingConfigurationError extends ConfigurationError {
  constructor(readonly missingFields: readonly string[]) {
    super(`Missing configuration values: ${missingFields.join(", ")}`);
    this.name = "MissingConfigurationError";
  }
}

export class RequiredConfigurationError extends ConfigurationError {
  constructor(readonly fieldName: string) {
    super(`Missing required configuration value: ${fieldName}`);
    this.name = "RequiredConfigurationError";
  }
}

export class TokenExchangeError extends ConfigurationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TokenExchangeError";
  }
}

/**
 * Marks a configured capability that has no implementation yet; deliberately not a ConfigurationError.
 */
export class UnimplementedCapabilityError extends Error {
  constructor(readonly capability: string, message: string) {
    super(message);
    this.name = "UnimplementedCapabilityError";
  }
}
