export enum SucuriErrorCode {
  REQUEST_FAILED = "REQUEST_FAILED",
  HTTP_STATUS = "HTTP_STATUS",
  BAD_RESPONSE = "BAD_RESPONSE",
  API_REJECTED = "API_REJECTED"
}

export class SucuriError extends Error {
  readonly code: SucuriErrorCode;
  readonly action: string;
  readonly statusCode?: number;
  /** Messages returned by the API, when it answered at all. */
  readonly messages: string[];
  override readonly cause?: unknown;

  constructor(
    message: string,
    code: SucuriErrorCode,
    options: { action: string; statusCode?: number; messages?: string[]; cause?: unknown }
  ) {
    super(message);
    this.name = "SucuriError";
    this.code = code;
    this.action = options.action;
    if (typeof options.statusCode === "number") {
      this.statusCode = options.statusCode;
    }
    this.messages = options.messages ?? [];
    if (typeof options.cause !== "undefined") {
      this.cause = options.cause;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export function isSucuriError(value: unknown): value is SucuriError {
  return value instanceof SucuriError;
}

// Replace any occurrence of the credentials before a message leaves the client.
export function redactCredentials(text: string, secrets: string[]): string {
  let redacted = text;
  for (const secret of secrets) {
    if (secret) {
      redacted = redacted.split(secret).join("[REDACTED]");
    }
  }
  return redacted;
}
