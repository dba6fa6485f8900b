import { Response } from "express";
import { AuthenticatedRequest } from "../types/express";
import { logger } from "../config/logger";
import { getGame } from "../services/catalog.service";
import { getCartPlan, materializeCart } from "../services/cart.service";
import { saveVisitor } from "../services/visitor.service";
import type { VisitorState } from "../services/visitor.service";
import { addToCart, clearCart, removeFromCart } from "../utils/sessionCart";
import { NotFoundError } from "../utils/errors";
import { sendError } from "../utils/httpErrors";
import { translate } from "../utils/i18n";
import { planFromTrainingSession } from "../utils/sessionPlan";

const log = logger.child({ module: "cart" });

// Cart handlers always run after loadVisitorState
function requireVisitor(req: AuthenticatedRequest, res: Response): VisitorState | null {
  if (!req.visitor) {
    res.status(400).json({ success: false, error: "Missing session" });
    return null;
  }
  return req.visitor;
}

function readGameId(body: unknown): number | null {
  if (typeof body !== "object" || body === null || !("gameId" in body)) return null;
  const raw = body.gameId;
  const id = typeof raw === "number" ? raw : typeof raw === "string" && /^\d+$/.test(raw.trim()) ? Number(raw) : NaN;
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

// GET /cart
export const viewCart = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const visitor = requireVisitor(req, res);
  if (!visitor) return;

  try {
    const plan = await getCartPlan(visitor.cart);
    res.json({ ...plan, cartCount: visitor.cart.length });
  } catch (err) {
    sendError(res, err, "Error fetching cart");
  }
};

// POST /cart/add
export const addGameToCart = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const visitor = requireVisitor(req, res);
  if (!visitor) return;

  const gameId = readGameId(req.body);
  if (gameId === null) {
    res.status(400).json({ success: false, error: translate(visitor.language, "cart.gameIdRequired") });
    return;
  }

  try {
    await getGame(gameId);

    const { cart, size, changed } = addToCart(visitor.cart, gameId);
    if (changed) {
      visitor.cart = cart;
      visitor.modified = true;
      await saveVisitor(visitor);
      log.debug({ sessionId: visitor.sessionId, gameId }, "Game added to cart");
    }

    res.json({
      success: true,
      message: translate(visitor.language, changed ? "cart.added" : "cart.alreadyAdded"),
      cartCount: size,
    });
  } catch (err) {
    if (err instanceof NotFoundError) {
      res.status(404).json({ success: false, error: translate(visitor.language, "cart.gameNotFound") });
      return;
    }
    sendError(res, err, "Error adding game to cart");
  }
};

// POST /cart/remove
export const removeGameFromCart = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const visitor = requireVisitor(req, res);
  if (!visitor) return;

  const gameId = readGameId(req.body);
  if (gameId === null) {
    res.status(400).json({ success: false, error: translate(visitor.language, "cart.gameIdRequired") });
    return;
  }

  try {
    const { cart, size, changed } = removeFromCart(visitor.cart, gameId);
    if (changed) {
      visitor.cart = cart;
      visitor.modified = true;
      await saveVisitor(visitor);
      log.debug({ sessionId: visitor.sessionId, gameId }, "Game removed from cart");
    }

    res.json({
      success: true,
      message: translate(visitor.language, changed ? "cart.removed" : "cart.notInCart"),
      cartCount: size,
    });
  } catch (err) {
    sendError(res, err, "Error removing game from cart");
  }
};

// POST /cart/clear
export const clearVisitorCart = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const visitor = requireVisitor(req, res);
  if (!visitor) return;

  try {
    const { cart, size } = clearCart();
    visitor.cart = cart;
    visitor.modified = true;
    await saveVisitor(visitor);

    res.json({ success: true, message: translate(visitor.language, "cart.cleared"), cartCount: size });
  } catch (err) {
    sendError(res, err, "Error clearing cart");
  }
};

// POST /cart/checkout
export const checkoutCart = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const visitor = requireVisitor(req, res);
  if (!visitor) return;

  if (!req.user) {
    res.status(401).json({ success: false, error: translate(visitor.language, "session.loginRequired") });
    return;
  }

  try {
    const { session, skipped, cart } = await materializeCart(visitor, req.body, req.user);
    visitor.cart = cart;

    res.status(201).json({
      success: true,
      message: translate(visitor.language, "session.created", { name: session.name }),
      session: planFromTrainingSession(session),
      skipped,
      cartCount: cart.length,
    });
  } catch (err) {
    sendError(res, err, "Error saving training session");
  }
};

