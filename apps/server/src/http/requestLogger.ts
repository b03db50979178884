import type { IncomingMessage, ServerResponse } from "node:http";

import type { Logger } from "../logger";
import { getIpAddress, normalizePath } from "./utils";

type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

const SILENT_PATHS: ReadonlySet<string> = new Set(["/health"]);

/**
 * Logs one line per completed request. Only the path is recorded; query strings can carry
 * authorization codes and state values.
 */
export const withRequestLogging = (
  logger: Logger,
  handler: RequestHandler,
  now: () => number = () => performance.now()
): RequestHandler => {
  return async (req, res) => {
    const startedAt = now();
    const { path } = normalizePath(req.url);
    res.on("finish", () => {
      if (SILENT_PATHS.has(path)) {
        return;
      }
      logger.info("Request completed", {
        method: req.method,
        path,
        status: res.statusCode,
        durationMs: Math.round((now() - startedAt) * 100) / 100,
        ip: getIpAddress(req)
      });
    });
    await handler(req, res);
  };
};
