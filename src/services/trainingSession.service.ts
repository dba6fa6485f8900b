import { AppDataSource } from "../config/data-source";
import { Game } from "../entities/Game";
import { SessionGame } from "../entities/SessionGame";
import { TrainingSession } from "../entities/TrainingSession";
import { sessionEntrySchema, sessionEntryUpdateSchema } from "../schemas/session.schema";
import { parseInput } from "../schemas/parse";
import { NotFoundError, ValidationError } from "../utils/errors";
import { totalDuration } from "../utils/duration";
import { getGame } from "./catalog.service";
import type { SessionOwner } from "./cart.service";

export interface SessionSummary {
  id: number;
  name: string;
  description: string;
  createdAt: Date;
  gameCount: number;
  totalMinutes: number;
}

export async function listOwnSessions(owner: SessionOwner): Promise<SessionSummary[]> {
  const sessions = await AppDataSource.getRepository(TrainingSession).find({
    where: { createdById: owner.id },
    relations: ["entries", "entries.game"],
    order: { createdAt: "DESC" },
  });

  return sessions.map((session) => ({
    id: session.id,
    name: session.name,
    description: session.description,
    createdAt: session.createdAt,
    gameCount: session.entries.length,
    totalMinutes: totalDuration(session.entries),
  }));
}

/**
 * A session of `owner` with its entries and games. Sessions of other
 * accounts are reported as not found.
 */
export async function getOwnSession(id: number, owner: SessionOwner): Promise<TrainingSession> {
  const session = await AppDataSource.getRepository(TrainingSession).findOne({
    where: { id, createdById: owner.id },
    relations: ["entries", "entries.game"],
  });

  if (!session) throw new NotFoundError("Training session");
  return session;
}

async function findOwnSessionRow(id: number, owner: SessionOwner): Promise<TrainingSession> {
  const session = await AppDataSource.getRepository(TrainingSession).findOneBy({ id, createdById: owner.id });
  if (!session) throw new NotFoundError("Training session");
  return session;
}

// (session, game, order) must be unique; the same game may appear at another position
async function assertPositionFree(sessionId: number, gameId: number, order: number, exceptEntryId?: number): Promise<void> {
  const clash = await AppDataSource.getRepository(SessionGame).findOneBy({ sessionId, gameId, order });
  if (clash && clash.id !== exceptEntryId) {
    throw ValidationError.forField("order", `This game is already in the session at position ${order}`);
  }
}

// Only games the public catalog shows can be planned
async function resolveVisibleGame(gameId: number): Promise<Game> {
  try {
    return await getGame(gameId);
  } catch (err) {
    if (err instanceof NotFoundError) throw ValidationError.forField("gameId", "Game not found");
    throw err;
  }
}

export async function addSessionEntry(sessionId: number, owner: SessionOwner, input: unknown): Promise<SessionGame> {
  const session = await findOwnSessionRow(sessionId, owner);
  const data = parseInput(sessionEntrySchema, input);

  const game = await resolveVisibleGame(data.gameId);
  await assertPositionFree(session.id, data.gameId, data.order);

  const repo = AppDataSource.getRepository(SessionGame);
  const entry = await repo.save(repo.create({ ...data, sessionId: session.id }));
  entry.game = game;
  return entry;
}

export async function updateSessionEntry(
  sessionId: number,
  entryId: number,
  owner: SessionOwner,
  input: unknown
): Promise<SessionGame> {
  const session = await findOwnSessionRow(sessionId, owner);
  const data = parseInput(sessionEntryUpdateSchema, input);

  const repo = AppDataSource.getRepository(SessionGame);
  const entry = await repo.findOneBy({ id: entryId, sessionId: session.id });
  if (!entry) throw new NotFoundError("Session entry");

  const gameId = data.gameId ?? entry.gameId;
  const order = data.order ?? entry.order;
  if (gameId !== entry.gameId) await resolveVisibleGame(gameId);
  if (gameId !== entry.gameId || order !== entry.order) {
    await assertPositionFree(session.id, gameId, order, entry.id);
  }

  entry.gameId = gameId;
  entry.order = order;
  if (data.durationMultiplier !== undefined) entry.durationMultiplier = data.durationMultiplier;
  if (data.notes !== undefined) entry.notes = data.notes;
  return repo.save(entry);
}

export async function removeSessionEntry(sessionId: number, entryId: number, owner: SessionOwner): Promise<void> {
  const session = await findOwnSessionRow(sessionId, owner);
  const result = await AppDataSource.getRepository(SessionGame).delete({ id: entryId, sessionId: session.id });
  if (!result.affected) throw new NotFoundError("Session entry");
}

export async function deleteSession(sessionId: number, owner: SessionOwner): Promise<void> {
  const session = await findOwnSessionRow(sessionId, owner);
  await AppDataSource.getRepository(TrainingSession).remove(session);
}
