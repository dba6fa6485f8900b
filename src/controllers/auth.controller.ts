import { Request, Response } from "express";
import bcrypt from "bcrypt";
import { AppDataSource } from "../config/data-source";
import { isProduction } from "../config/settings";
import { logger } from "../config/logger";
import { User } from "../entities/User";
import { AuthenticatedRequest } from "../types/express";
import { authSchemaLogin, authSchemaRegister } from "../schemas/auth.schema";
import { signToken } from "../utils/authToken";

const log = logger.child({ module: "auth" });

const TOKEN_COOKIE = "token";
const TOKEN_MAX_AGE = 7 * 24 * 60 * 60 * 1000; // 7 days
const BCRYPT_ROUNDS = 10;

function setTokenCookie(res: Response, user: User): void {
  const token = signToken({ id: user.id, role: user.role, email: user.email });
  res.cookie(TOKEN_COOKIE, token, {
    httpOnly: true,
    secure: isProduction,
    sameSite: "strict",
    maxAge: TOKEN_MAX_AGE,
  });
}

export async function register(req: Request, res: Response): Promise<void> {
  try {
    const result = authSchemaRegister.safeParse(req.body);

    if (!result.success) {
      res.status(400).json({
        error: "Invalid input",
        details: result.error.flatten(),
      });
      return;
    }

    const { email, password } = result.data;
    const repo = AppDataSource.getRepository(User);
    const existing = await repo.findOneBy({ email });
    if (existing) {
      res.status(409).json({ error: "Email already in use" });
      return;
    }

    const hashed = await bcrypt.hash(password, BCRYPT_ROUNDS);
    const user = await repo.save(repo.create({ email, password: hashed, role: "user" }));
    setTokenCookie(res, user);
    log.info({ userId: user.id }, "User registered");

    res.status(201).json({
      message: "User registered successfully",
      user: { id: user.id, email: user.email, role: user.role },
    });
  } catch (error) {
    log.error({ err: error }, "❌ Error in register");
    res.status(500).json({ error: "Internal server error" });
  }
}

// The browser session (cart, language) survives login so the cart can be saved afterwards
export async function login(req: Request, res: Response): Promise<void> {
  try {
    const result = authSchemaLogin.safeParse(req.body);
    if (!result.success) {
      res.status(401).json({ error: "Invalid credentials" });
      return;
    }

    const { email, password } = result.data;
    const user = await AppDataSource.getRepository(User).findOneBy({ email });

    if (!user || !(await bcrypt.compare(password, user.password))) {
      res.status(401).json({ error: "Invalid credentials" });
      return;
    }

    setTokenCookie(res, user);
    res.json({
      message: "Login successful",
      user: { id: user.id, email: user.email, role: user.role },
    });
  } catch (error) {
    log.error({ err: error }, "❌ Error in login");
    res.status(500).json({ error: "Internal server error" });
  }
}

export function logout(_req: Request, res: Response): void {
  res.clearCookie(TOKEN_COOKIE, {
    httpOnly: true,
    secure: isProduction,
    sameSite: "strict",
  });
  res.json({ message: "Logged out successfully" });
}

export const getCurrentUser = (req: AuthenticatedRequest, res: Response): void => {
  const user = req.user;

  if (!user) {
    res.status(401).json({ error: "Unauthorized" });
    return;
  }

  const { id, email, role } = user;
  res.json({ id, email, role });
};
