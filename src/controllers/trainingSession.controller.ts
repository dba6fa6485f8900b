import { Response } from "express";
import { AuthenticatedRequest } from "../types/express";
import {
  addSessionEntry,
  deleteSession,
  getOwnSession,
  listOwnSessions,
  removeSessionEntry,
  updateSessionEntry,
} from "../services/trainingSession.service";
import { AuthenticationRequiredError, NotFoundError } from "../utils/errors";
import { parseIdParam, sendError } from "../utils/httpErrors";
import { planFromTrainingSession } from "../utils/sessionPlan";
import type { JwtPayload } from "../types/jwt";

function currentUser(req: AuthenticatedRequest): JwtPayload {
  if (!req.user) throw new AuthenticationRequiredError();
  return req.user;
}

function sessionIdParam(req: AuthenticatedRequest): number {
  const id = parseIdParam(req.params.id);
  if (id === null) throw new NotFoundError("Training session");
  return id;
}

function entryIdParam(req: AuthenticatedRequest): number {
  const id = parseIdParam(req.params.entryId);
  if (id === null) throw new NotFoundError("Session entry");
  return id;
}

// GET /sessions
export const getMySessions = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    res.json(await listOwnSessions(currentUser(req)));
  } catch (err) {
    sendError(res, err, "Error listing training sessions");
  }
};

// GET /sessions/:id
export const getMySession = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const session = await getOwnSession(sessionIdParam(req), currentUser(req));
    res.json(planFromTrainingSession(session));
  } catch (err) {
    sendError(res, err, "Error fetching training session");
  }
};

// POST /sessions/:id/entries
export const addEntry = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const entry = await addSessionEntry(sessionIdParam(req), currentUser(req), req.body);
    res.status(201).json(entry);
  } catch (err) {
    sendError(res, err, "Error adding session entry");
  }
};

// PATCH /sessions/:id/entries/:entryId
export const updateEntry = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const entry = await updateSessionEntry(sessionIdParam(req), entryIdParam(req), currentUser(req), req.body);
    res.json(entry);
  } catch (err) {
    sendError(res, err, "Error updating session entry");
  }
};

// DELETE /sessions/:id/entries/:entryId
export const removeEntry = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    await removeSessionEntry(sessionIdParam(req), entryIdParam(req), currentUser(req));
    res.status(204).send();
  } catch (err) {
    sendError(res, err, "Error removing session entry");
  }
};

// DELETE /sessions/:id
export const removeSession = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    await deleteSession(sessionIdParam(req), currentUser(req));
    res.status(204).send();
  } catch (err) {
    sendError(res, err, "Error deleting training session");
  }
};
