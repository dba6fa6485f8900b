import { Response, NextFunction } from "express";
import { AuthenticatedRequest } from "../types/express";

// attachVisitor has already verified the token cookie
export function requireAuth(req: AuthenticatedRequest, res: Response, next: NextFunction): void {
  if (!req.user) {
    res.status(401).json({ error: "Unauthorized" });
    return;
  }

  next();
}
