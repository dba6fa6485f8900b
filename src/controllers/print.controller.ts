import { Response } from "express";
import { AuthenticatedRequest } from "../types/express";
import { getGame } from "../services/catalog.service";
import { getCartPlan } from "../services/cart.service";
import { getOwnSession } from "../services/trainingSession.service";
import { generateGamePrintHTML } from "../templates/printGameTemplate";
import { generateSessionPrintHTML } from "../templates/printSessionTemplate";
import { translate } from "../utils/i18n";
import { parseIdParam, sendError } from "../utils/httpErrors";
import { planFromTrainingSession } from "../utils/sessionPlan";

function sendHtmlAttachment(res: Response, filename: string, html: string): void {
  res.setHeader("Content-Type", "text/html; charset=utf-8");
  res.setHeader("Content-Disposition", `attachment; filename="${filename}"`);
  res.send(html);
}

// GET /print/game/:id
export const printGame = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const id = parseIdParam(req.params.id);
    if (id === null) {
      res.status(404).json({ error: "Game not found" });
      return;
    }

    const game = await getGame(id);
    sendHtmlAttachment(res, `game_${game.id}.html`, generateGamePrintHTML(game));
  } catch (err) {
    sendError(res, err, "Error printing game");
  }
};

// GET /print/session/:id (owner only)
export const printSession = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const id = parseIdParam(req.params.id);
    if (id === null || !req.user) {
      res.status(404).json({ error: "Training session not found" });
      return;
    }

    const session = await getOwnSession(id, req.user);
    sendHtmlAttachment(res, `session_${session.id}.html`, generateSessionPrintHTML(planFromTrainingSession(session)));
  } catch (err) {
    sendError(res, err, "Error printing training session");
  }
};

// GET /print/cart
export const printCart = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const visitor = req.visitor;
  if (!visitor) {
    res.status(400).json({ success: false, error: "Missing session" });
    return;
  }

  try {
    const plan = await getCartPlan(visitor.cart);
    if (plan.entries.length === 0) {
      res.status(400).json({ success: false, error: translate(visitor.language, "cart.empty") });
      return;
    }

    sendHtmlAttachment(res, "training_session.html", generateSessionPrintHTML(plan));
  } catch (err) {
    sendError(res, err, "Error printing cart");
  }
};
