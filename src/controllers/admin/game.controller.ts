import { Response } from "express";
import { AuthenticatedRequest } from "../../types/express";
import { createGame, deactivateGame, listAllGames, updateGame } from "../../services/game.service";
import { AuthenticationRequiredError, NotFoundError } from "../../utils/errors";
import { parseIdParam, sendError } from "../../utils/httpErrors";

function gameIdParam(req: AuthenticatedRequest): number {
  const id = parseIdParam(req.params.id);
  if (id === null) throw new NotFoundError("Game");
  return id;
}

// Includes inactive games and pending suggestions
export const getAllGamesAdmin = async (_req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    res.json(await listAllGames());
  } catch (err) {
    sendError(res, err, "Error listing games");
  }
};

export const createGameAdmin = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    if (!req.user) throw new AuthenticationRequiredError();
    const game = await createGame(req.body, req.user);
    res.status(201).json(game);
  } catch (err) {
    sendError(res, err, "Error creating game");
  }
};

export const updateGameAdmin = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    res.json(await updateGame(gameIdParam(req), req.body));
  } catch (err) {
    sendError(res, err, "Error updating game");
  }
};

export const deactivateGameAdmin = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const game = await deactivateGame(gameIdParam(req));
    res.json({ message: "Game deactivated", game });
  } catch (err) {
    sendError(res, err, "Error deactivating game");
  }
};
