export type ErrorKind =
  | "UnsupportedFormat"
  | "TooLarge"
  | "AuthorizationFailed"
  | "UploadFailed"
  | "ProviderUnavailable"
  | "InvalidRequest"
  | "AssetNotFound"
  | "RecordNotFound"
  | "ClipFailed"
  | "CaptionFailed";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  UnsupportedFormat: 400,
  InvalidRequest: 400,
  TooLarge: 413,
  AuthorizationFailed: 401,
  AssetNotFound: 404,
  RecordNotFound: 404,
  UploadFailed: 502,
  ClipFailed: 502,
  CaptionFailed: 502,
  ProviderUnavailable: 503,
};

export class AppError extends Error {
  readonly statusCode: number;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly reason?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AppError";
    this.statusCode = STATUS_BY_KIND[kind];
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/** Why an authorization attempt ended without a token. */
export type AuthorizationFailure =
  | "denied"
  | "timeout"
  | "token_exchange"
  | "listener"
  | "client_secrets";

export class AuthorizationError extends AppError {
  constructor(
    public readonly failure: AuthorizationFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("AuthorizationFailed", message, failure, options);
    this.name = "AuthorizationError";
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

export class ProviderUnavailableError extends AppError {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("ProviderUnavailable", message, provider, options);
    this.name = "ProviderUnavailableError";
    Object.setPrototypeOf(this, ProviderUnavailableError.prototype);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
