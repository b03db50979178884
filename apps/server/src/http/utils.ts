import type { IncomingMessage, ServerResponse } from "node:http";

const MAX_BODY_SIZE = 65_536; // 64 KiB

/** Raised for bodies that are too large or not JSON; routers answer 400. */
export class InvalidBodyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidBodyError";
  }
}

export const readJsonBody = async (req: IncomingMessage): Promise<unknown> => {
  return new Promise<unknown>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let rejected = false;

    req.on("data", (chunk: Buffer) => {
      if (rejected) {
        return;
      }
      total += chunk.length;
      if (total > MAX_BODY_SIZE) {
        rejected = true;
        reject(new InvalidBodyError("Request body too large"));
        req.resume();
        return;
      }
      chunks.push(chunk);
    });

    req.on("end", () => {
      if (rejected) {
        return;
      }
      if (chunks.length === 0) {
        resolve(null);
        return;
      }
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf8"));
        resolve(parsed);
      } catch (error) {
        reject(new InvalidBodyError("Request body is not valid JSON", { cause: error }));
      }
    });

    req.on("error", (error) => {
      reject(error);
    });
  });
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export interface JsonResponseOptions {
  readonly status?: number;
  readonly headers?: Record<string, string>;
}

export const sendJson = (res: ServerResponse, data: unknown, options: JsonResponseOptions = {}): void => {
  const status = options.status ?? 200;
  const baseHeaders: Record<string, string | string[]> = {
    "Content-Type": "application/json; charset=utf-8",
    "Cache-Control": "no-store"
  };
  if (options.headers) {
    for (const [key, value] of Object.entries(options.headers)) {
      baseHeaders[key] = value;
    }
  }
  res.writeHead(status, baseHeaders);
  res.end(JSON.stringify(data));
};

export const sendRedirect = (res: ServerResponse, location: string, headers: Record<string, string> = {}): void => {
  res.writeHead(302, { ...headers, Location: location, "Cache-Control": "no-store" });
  res.end();
};

export const sendNoContent = (res: ServerResponse, headers: Record<string, string> = {}): void => {
  res.writeHead(204, headers);
  res.end();
};

export const getIpAddress = (req: IncomingMessage): string | undefined => {
  const forwarded = req.headers["x-forwarded-for"];
  if (typeof forwarded === "string") {
    return forwarded.split(",")[0]?.trim();
  }
  if (Array.isArray(forwarded)) {
    return forwarded[0];
  }
  return req.socket.remoteAddress ?? undefined;
};

export const normalizePath = (rawUrl: string | undefined): { path: string; query: URLSearchParams } => {
  const url = new URL(rawUrl ?? "/", "http://localhost");
  return { path: url.pathname.replace(/\/+$/, "") || "/", query: url.searchParams };
};
