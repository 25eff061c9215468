import type { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";

export const SESSION_HEADER = "X-Session-Id";

/**
 * Session id from the X-Session-Id request header, or a fresh one when the
 * caller has none yet. The id is always echoed back in the response header.
 */
export function getOrCreateSessionId(req: Request, res: Response): string {
  const supplied = req.get(SESSION_HEADER)?.trim();
  const sessionId = supplied || uuidv4();
  res.setHeader(SESSION_HEADER, sessionId);
  return sessionId;
}

export function getSessionId(req: Request): string | undefined {
  return req.get(SESSION_HEADER)?.trim() || undefined;
}
