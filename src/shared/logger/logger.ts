import pino from "pino";

const defaultLevel = (): string => {
  if (process.env.NODE_ENV === "production") {
    return "info";
  }

  return process.env.NODE_ENV === "test" ? "silent" : "debug";
};

export const logger = pino({
  name: "legal-search-agent",
  level: process.env.LOG_LEVEL ?? defaultLevel(),
});

/**
 * Flattens unknown failures into a loggable shape so pino output stays stable for non-Error throws.
 */
export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
    };
  }

  return { message: String(error) };
};
