import jwt from "jsonwebtoken";
import { z } from "zod";
import { settings } from "../config/settings";
import { JwtPayload } from "../types/jwt";

const TOKEN_EXPIRY = "7d";

const payloadSchema = z.object({
  id: z.number().int().positive(),
  role: z.enum(["user", "admin"]),
  email: z.string(),
});

export function signToken(payload: JwtPayload): string {
  return jwt.sign(payload, settings.JWT_SECRET, { expiresIn: TOKEN_EXPIRY });
}

/**
 * Verifies a token and returns its payload, or null when the token is
 * invalid, expired or not one of ours.
 */
export function readToken(token: string): JwtPayload | null {
  try {
    const decoded = jwt.verify(token, settings.JWT_SECRET);
    const result = payloadSchema.safeParse(decoded);
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}
