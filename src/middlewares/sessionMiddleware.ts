import { Response, NextFunction } from "express";
import { v4 as uuidv4, validate as isUuid } from "uuid";
import { AuthenticatedRequest } from "../types/express";
import { readToken } from "../utils/authToken";
import { loadVisitor } from "../services/visitor.service";
import { logger } from "../config/logger";
import { isProduction } from "../config/settings";

const SESSION_COOKIE = "sessionId";
const SESSION_MAX_AGE = 30 * 24 * 60 * 60 * 1000; // 30 days

/**
 * Identifies the browser session (sessionId cookie) and, when a valid token
 * cookie is present, the logged-in user. Never rejects a request.
 */
export const attachVisitor = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
  const token: unknown = req.cookies?.token;
  if (typeof token === "string" && token) {
    const payload = readToken(token);
    if (payload) {
      req.user = payload;
    } else {
      logger.warn("⚠️ Invalid token in attachVisitor");
    }
  }

  const cookie: unknown = req.cookies?.[SESSION_COOKIE];
  if (typeof cookie === "string" && isUuid(cookie)) {
    req.sessionId = cookie;
  } else {
    req.sessionId = uuidv4();
    res.cookie(SESSION_COOKIE, req.sessionId, {
      httpOnly: true,
      secure: isProduction || req.secure,
      maxAge: SESSION_MAX_AGE,
      sameSite: "lax",
    });
  }

  next();
};

/**
 * Loads the visitor's cart and language from the session store.
 */
export const loadVisitorState = async (
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  if (!req.sessionId) {
    res.status(400).json({ error: "Missing session" });
    return;
  }

  try {
    req.visitor = await loadVisitor(req.sessionId);
    next();
  } catch (err) {
    logger.error({ err }, "❌ Error loading visitor session");
    res.status(500).json({ error: "Internal server error" });
  }
};
