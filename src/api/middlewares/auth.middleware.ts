/**
 * Auth Middleware
 *
 * Protects the status and check-trigger routes with a shared bearer
 * secret (SERVICE_SECRET).
 */
import crypto from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import config from "../../config";
import { logger } from "../../monitoring/logger";

const BEARER_PREFIX = "Bearer ";

function sameSecret(presented: string, expected: string): boolean {
  const a = Buffer.from(presented, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * 401 without a bearer token, 403 with the wrong one.
 */
export function requireServiceSecret(secret: string = config.serviceSecret): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization ?? "";

    if (!header.startsWith(BEARER_PREFIX)) {
      logger.warn({ ip: req.ip, path: req.path }, "Missing bearer token");
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    if (!sameSecret(header.slice(BEARER_PREFIX.length), secret)) {
      logger.warn({ ip: req.ip, path: req.path }, "Wrong service secret");
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    next();
  };
}
