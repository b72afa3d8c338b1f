import type { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "../utils/logger";

/** Bearer-token guard for the operator endpoints. */
export function authMiddleware(expectedToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedToken) {
      logger.error("SERVER_API_KEY not configured");
      res.status(500).json({ error: "Server configuration error" });
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      logger.warn("Authentication failed: missing or invalid authorization header");
      res
        .status(401)
        .json({ error: "Unauthorized: missing or invalid authorization header" });
      return;
    }

    const token = authHeader.substring(7);
    if (token !== expectedToken) {
      logger.warn("Authentication failed: invalid API key");
      res.status(401).json({ error: "Unauthorized: invalid API key" });
      return;
    }

    next();
  };
}
