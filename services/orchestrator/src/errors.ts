export type InputErrorKind = "invalid_url" | "fetch_failed" | "not_an_image";

export type TransportErrorKind = "auth" | "throttle" | "malformed_response" | "network";

export type FailureKind = InputErrorKind | TransportErrorKind | "internal";

export class InputError extends Error {
  public readonly kind: InputErrorKind;

  constructor(kind: InputErrorKind, message: string) {
    super(message);
    this.name = "InputError";
    this.kind = kind;
  }
}

export class TransportError extends Error {
  public readonly kind: TransportErrorKind;
  public readonly backendId: string;
  public readonly status?: number;

  constructor(kind: TransportErrorKind, backendId: string, message: string, status?: number) {
    super(message);
    this.name = "TransportError";
    this.kind = kind;
    this.backendId = backendId;
    this.status = status;
  }
}

export class AuthError extends TransportError {
  constructor(backendId: string, message: string, status?: number) {
    super("auth", backendId, message, status);
    this.name = "AuthError";
  }
}

export class ThrottleError extends TransportError {
  constructor(backendId: string, message: string, status?: number) {
    super("throttle", backendId, message, status);
    this.name = "ThrottleError";
  }
}

export class MalformedResponseError extends TransportError {
  constructor(backendId: string, message: string) {
    super("malformed_response", backendId, message);
    this.name = "MalformedResponseError";
  }
}

export class NetworkError extends TransportError {
  constructor(backendId: string, message: string, status?: number) {
    super("network", backendId, message, status);
    this.name = "NetworkError";
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
