/**
 * Outbound JSON requests to identity provider endpoints. Every attempt carries a timeout; a
 * transport failure or timeout is retried once, a non-2xx answer never is.
 */
export type ProviderHttpErrorCode = "transport" | "timeout" | "http_status" | "invalid_json";

export class ProviderHttpError extends Error {
  readonly code: ProviderHttpErrorCode;
  readonly status: number | null;
  readonly url: string;

  constructor(message: string, code: ProviderHttpErrorCode, url: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ProviderHttpError";
    this.code = code;
    this.status = options.status ?? null;
    this.url = url;
  }
}

export interface ProviderRequest {
  readonly method: "GET" | "POST";
  readonly url: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly form?: Readonly<Record<string, string>>;
}

export interface ProviderHttpClientOptions {
  readonly timeoutMs: number;
  readonly fetchImplementation?: typeof fetch;
  readonly maxAttempts?: number;
}

const USER_AGENT = "keyrelay-auth";

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");

export class ProviderHttpClient {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;

  constructor(options: ProviderHttpClientOptions) {
    this.fetchImpl = options.fetchImplementation ?? fetch;
    this.timeoutMs = options.timeoutMs;
    this.maxAttempts = options.maxAttempts ?? 2;
  }

  async requestJson(request: ProviderRequest): Promise<unknown> {
    const response = await this.send(request);
    const text = await response.text();
    if (!response.ok) {
      throw new ProviderHttpError(`Provider answered ${response.status}`, "http_status", request.url, {
        status: response.status
      });
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new ProviderHttpError("Provider answered with invalid JSON", "invalid_json", request.url, {
        status: response.status,
        cause: error
      });
    }
  }

  private async send(request: ProviderRequest): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": USER_AGENT,
      ...(request.headers ?? {})
    };
    let body: string | undefined;
    if (request.form) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      body = new URLSearchParams(request.form).toString();
    }

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await this.fetchImpl(request.url, {
          method: request.method,
          headers,
          body,
          signal: AbortSignal.timeout(this.timeoutMs)
        });
      } catch (error) {
        lastError = error;
      }
    }

    const timedOut = isTimeout(lastError);
    throw new ProviderHttpError(
      timedOut ? `Provider request timed out after ${this.timeoutMs}ms` : "Provider request failed",
      timedOut ? "timeout" : "transport",
      request.url,
      { cause: lastError }
    );
  }
}
