import { Game } from "../entities/Game";
import { TrainingSession } from "../entities/TrainingSession";
import { DURATION_MULTIPLIER } from "../config/catalog";
import { totalDuration } from "./duration";

export interface SessionPlanEntry {
  game: Game;
  order: number;
  durationMultiplier: number;
  notes: string;
}

/**
 * Shared shape for an unsaved cart and a saved training session, used by
 * the cart view and the printable exports.
 */
export interface SessionPlan {
  id: number | null;
  name: string;
  description: string;
  createdAt: Date | null;
  entries: SessionPlanEntry[];
  totalMinutes: number;
}

export const UNSAVED_PLAN_NAME = "Training Session";

export function planFromCart(cart: readonly number[], games: readonly Game[]): SessionPlan {
  const byId = new Map(games.map((game) => [game.id, game]));
  const entries: SessionPlanEntry[] = [];

  for (const gameId of cart) {
    const game = byId.get(gameId);
    if (!game) continue;
    entries.push({
      game,
      order: entries.length + 1,
      durationMultiplier: DURATION_MULTIPLIER.DEFAULT,
      notes: "",
    });
  }

  return {
    id: null,
    name: UNSAVED_PLAN_NAME,
    description: "",
    createdAt: null,
    entries,
    totalMinutes: totalDuration(entries),
  };
}

export function planFromTrainingSession(session: TrainingSession): SessionPlan {
  const entries = [...(session.entries ?? [])]
    .sort((a, b) => a.order - b.order || a.id - b.id)
    .map((entry) => ({
      game: entry.game,
      order: entry.order,
      durationMultiplier: entry.durationMultiplier,
      notes: entry.notes,
    }));

  return {
    id: session.id,
    name: session.name,
    description: session.description,
    createdAt: session.createdAt,
    entries,
    totalMinutes: totalDuration(entries),
  };
}
