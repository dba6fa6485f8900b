import { Request, Response } from "express";
import { createBlock, deleteBlock, isContentKind, listBlocks, updateBlock } from "../../services/content.service";
import type { ContentKind } from "../../services/content.service";
import { NotFoundError } from "../../utils/errors";
import { parseIdParam, sendError } from "../../utils/httpErrors";

// /admin/content/:kind where kind is about or impressum
function kindParam(req: Request): ContentKind {
  const kind = req.params.kind;
  if (!isContentKind(kind)) throw new NotFoundError("Content page");
  return kind;
}

function blockIdParam(req: Request): number {
  const id = parseIdParam(req.params.id);
  if (id === null) throw new NotFoundError("Content block");
  return id;
}

export const getBlocks = async (req: Request, res: Response): Promise<void> => {
  try {
    res.json(await listBlocks(kindParam(req)));
  } catch (err) {
    sendError(res, err, "Error listing content blocks");
  }
};

export const createBlockAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    res.status(201).json(await createBlock(kindParam(req), req.body));
  } catch (err) {
    sendError(res, err, "Error creating content block");
  }
};

export const updateBlockAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    res.json(await updateBlock(kindParam(req), blockIdParam(req), req.body));
  } catch (err) {
    sendError(res, err, "Error updating content block");
  }
};

export const deleteBlockAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    await deleteBlock(kindParam(req), blockIdParam(req));
    res.status(204).send();
  } catch (err) {
    sendError(res, err, "Error deleting content block");
  }
};
