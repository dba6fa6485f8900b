import { In } from "typeorm";
import { AppDataSource } from "../config/data-source";
import { logger } from "../config/logger";
import { DURATION_MULTIPLIER } from "../config/catalog";
import { Game } from "../entities/Game";
import { SessionGame } from "../entities/SessionGame";
import { TrainingSession } from "../entities/TrainingSession";
import { createSessionSchema } from "../schemas/session.schema";
import { parseInput } from "../schemas/parse";
import { AuthenticationRequiredError } from "../utils/errors";
import { clearCart } from "../utils/sessionCart";
import type { Cart } from "../utils/sessionCart";
import { planFromCart } from "../utils/sessionPlan";
import type { SessionPlan } from "../utils/sessionPlan";
import { findVisibleGames } from "./catalog.service";
import { saveVisitor } from "./visitor.service";
import type { VisitorState } from "./visitor.service";

const log = logger.child({ module: "cart" });

export interface SessionOwner {
  id: number;
}

export interface MaterializeResult {
  session: TrainingSession;
  // Cart ids that no longer had a game and were left out
  skipped: number[];
  // The cart after checkout (always empty)
  cart: number[];
}

export async function getCartPlan(cart: Cart): Promise<SessionPlan> {
  const games = await findVisibleGames(cart);
  return planFromCart(cart, games);
}

/**
 * Saves the cart as a training session owned by `owner`: one entry per cart
 * game in cart order, numbered from 1, multiplier 1.0, no notes. Ids whose
 * game has been deleted are skipped. The session, its entries and the
 * emptied visitor cart are written in one transaction.
 */
export async function materializeCart(
  visitor: VisitorState,
  input: unknown,
  owner: SessionOwner | null | undefined
): Promise<MaterializeResult> {
  if (!owner) throw new AuthenticationRequiredError("Log in to save a training session");
  const { name, description } = parseInput(createSessionSchema, input);

  const cart: Cart = visitor.cart;

  return AppDataSource.transaction(async (manager) => {
    const sessionRepo = manager.getRepository(TrainingSession);
    const entryRepo = manager.getRepository(SessionGame);

    const games = cart.length > 0
      ? await manager.getRepository(Game).find({ where: { id: In([...cart]) } })
      : [];
    const gamesById = new Map(games.map((game) => [game.id, game]));

    const session = await sessionRepo.save(
      sessionRepo.create({ name, description, createdById: owner.id })
    );

    const entries: SessionGame[] = [];
    const skipped: number[] = [];

    for (const gameId of cart) {
      const game = gamesById.get(gameId);
      if (!game) {
        log.warn({ gameId, sessionId: session.id }, "Skipping stale game id during checkout");
        skipped.push(gameId);
        continue;
      }

      const entry = entryRepo.create({
        sessionId: session.id,
        gameId,
        order: entries.length + 1,
        durationMultiplier: DURATION_MULTIPLIER.DEFAULT,
        notes: "",
      });
      entry.game = game;
      entries.push(entry);
    }

    if (entries.length > 0) {
      await entryRepo.save(entries);
    }

    session.entries = entries;
    log.info(
      { sessionId: session.id, ownerId: owner.id, games: entries.length, skipped: skipped.length },
      `Training session "${session.name}" created`
    );

    const { cart: emptied } = clearCart();
    await saveVisitor({ ...visitor, cart: emptied, modified: true }, manager);

    return { session, skipped, cart: emptied };
  });
}
