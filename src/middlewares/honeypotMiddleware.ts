import { Request, Response, NextFunction } from "express";

// Hidden form field that only bots fill in
const HONEYPOT_FIELD = "website";

export function honeypotMiddleware(req: Request, res: Response, next: NextFunction): void {
  const trap: unknown = req.body?.[HONEYPOT_FIELD];

  if (typeof trap === "string" && trap.trim() !== "") {
    // Silent rejection to trick bots
    res.status(200).json({ success: true });
    return;
  }

  next();
}
