export class ValidationError extends Error {
  constructor(message: string, public readonly value?: unknown) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ExecutionError extends Error {
  constructor(
    message: string,
    public readonly options: {
      venue?: string;
      orderId?: string;
      cause?: unknown;
    } = {}
  ) {
    super(message);
    this.name = "ExecutionError";
  }
}

export class MonitoringError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "MonitoringError";
  }
}

export class VenueError extends Error {
  constructor(
    message: string,
    public readonly options: {
      venue: string;
      operation: string;
      code?: string;
    }
  ) {
    super(message);
    this.name = "VenueError";
  }
}

export class NetworkError extends VenueError {
  constructor(message: string, options: ConstructorParameters<typeof VenueError>[1]) {
    super(message, options);
    this.name = "NetworkError";
  }
}

export class RateLimitError extends VenueError {
  constructor(message: string, options: ConstructorParameters<typeof VenueError>[1]) {
    super(message, options);
    this.name = "RateLimitError";
  }
}

export class OrderRejectedError extends VenueError {
  constructor(message: string, options: ConstructorParameters<typeof VenueError>[1]) {
    super(message, options);
    this.name = "OrderRejectedError";
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof NetworkError || error instanceof RateLimitError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
