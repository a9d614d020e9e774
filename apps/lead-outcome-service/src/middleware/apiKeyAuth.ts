import { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Middleware to authenticate callers via a shared API key
 * Looks for key in: X-API-Key header, Authorization Bearer, or ?api_key query param
 *
 * An empty `expectedKey` disables the check (dev mode).
 */
export function apiKeyAuth(expectedKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedKey) {
      return next();
    }

    const apiKey = extractApiKey(req);

    if (!apiKey) {
      return res.status(401).json({
        error: "Missing API key. Provide via X-API-Key header, Authorization Bearer, or api_key query param"
      });
    }

    if (apiKey !== expectedKey) {
      console.warn(`[apiKeyAuth] Rejected request to ${req.path}: invalid API key`);
      return res.status(401).json({ error: "Invalid API key" });
    }

    next();
  };
}

/**
 * Extract API key from request
 */
export function extractApiKey(req: Request): string | null {
  // 1. X-API-Key header
  const headerKey = req.headers["x-api-key"];
  if (typeof headerKey === "string" && headerKey) {
    return headerKey;
  }

  // 2. Authorization: Bearer <key>
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }

  // 3. Query param
  const queryKey = req.query.api_key;
  if (typeof queryKey === "string" && queryKey) {
    return queryKey;
  }

  return null;
}
