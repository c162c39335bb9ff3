import { SucuriError, SucuriErrorCode, redactCredentials } from "./errors.js";
import { clearCache, showSettings, type SucuriRequest } from "./requests.js";

export const DEFAULT_API_URL = "https://waf.sucuri.net/api?v2";
export const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type SucuriClientOptions = {
  apiKey: string;
  apiSecret: string;
  apiUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

export type SucuriResponse = {
  status: number;
  action: string;
  messages: string[];
  output: unknown;
  requestTime?: number;
};

export class SucuriClient {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: SucuriClientOptions) {
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Send one request and resolve with the parsed API response.
   *
   * Rejects with a {@link SucuriError} when the request cannot be sent, the
   * server answers with a non-2xx status, the body is not the expected JSON,
   * or the API reports `status: 0`.
   */
  async submit(request: SucuriRequest): Promise<SucuriResponse> {
    // Credentials go last; request params never replace them.
    const body = new URLSearchParams({
      ...request.params,
      k: this.apiKey,
      s: this.apiSecret,
      a: request.action
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.apiUrl, {
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          accept: "application/json"
        },
        body: body.toString(),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new SucuriError(
        this.redact(`Request "${request.description}" failed: ${describeFailure(err)}`),
        SucuriErrorCode.REQUEST_FAILED,
        { action: request.action, cause: err }
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new SucuriError(
        this.redact(`Request "${request.description}" failed while reading the response: ${describeFailure(err)}`),
        SucuriErrorCode.REQUEST_FAILED,
        { action: request.action, statusCode: response.status, cause: err }
      );
    }
    if (!response.ok) {
      throw new SucuriError(
        this.redact(`Request "${request.description}" returned HTTP ${response.status}: ${truncate(text)}`),
        SucuriErrorCode.HTTP_STATUS,
        { action: request.action, statusCode: response.status }
      );
    }

    const parsed = parseResponse(text);
    if (!parsed) {
      throw new SucuriError(
        this.redact(`Request "${request.description}" returned an unexpected body: ${truncate(text)}`),
        SucuriErrorCode.BAD_RESPONSE,
        { action: request.action, statusCode: response.status }
      );
    }
    if (parsed.status !== 1) {
      const messages = parsed.messages.map((message) => this.redact(message));
      const detail = messages.length > 0 ? messages.join("; ") : "no message";
      throw new SucuriError(`Request "${request.description}" was rejected: ${detail}`, SucuriErrorCode.API_REJECTED, {
        action: request.action,
        statusCode: response.status,
        messages
      });
    }
    return parsed;
  }

  async showSettings(): Promise<SucuriResponse> {
    return this.submit(showSettings());
  }

  async clearCache(): Promise<SucuriResponse> {
    return this.submit(clearCache());
  }

  private redact(text: string): string {
    return redactCredentials(text, [this.apiKey, this.apiSecret]);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}

function parseResponse(text: string): SucuriResponse | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(value)) {
    return null;
  }
  const record = value;
  const status = Number(record.status);
  if (!Number.isFinite(status)) {
    return null;
  }
  const messages = Array.isArray(record.messages)
    ? record.messages.filter((entry): entry is string => typeof entry === "string")
    : [];
  const response: SucuriResponse = {
    status,
    action: typeof record.action === "string" ? record.action : "",
    messages,
    output: record.output ?? null
  };
  if (typeof record.request_time === "number" || typeof record.request_time === "string") {
    const requestTime = Number(record.request_time);
    if (Number.isFinite(requestTime)) {
      response.requestTime = requestTime;
    }
  }
  return response;
}

function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "TimeoutError" ? "timed out" : err.message;
  }
  return String(err);
}

function truncate(text: string, max = 200): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}
