import type { RequestHandler } from "express";
import { rateLimit } from "express-rate-limit";
import type { ApiConfig } from "./config";
import { logger } from "./logger";

export const RATE_LIMIT_MESSAGE = "Rate limit exceeded! Please try again later.";

/**
 * Fixed window of RATE_LIMIT_MAX requests per RATE_LIMIT_WINDOW_MS, counted
 * per client address (req.ip, which honours TRUST_PROXY).
 */
export function createRateLimiter(
  config: Pick<ApiConfig, "RATE_LIMIT_WINDOW_MS" | "RATE_LIMIT_MAX">,
): RequestHandler {
  return rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    handler: (req, res, _next, options) => {
      logger.warn({ ip: req.ip, path: req.path }, "Rate limit exceeded");
      res.status(options.statusCode).type("text/plain").send(RATE_LIMIT_MESSAGE);
    },
  });
}
