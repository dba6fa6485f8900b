import { Request, Response } from "express";
import {
  createLanguage,
  createTag,
  deleteLanguage,
  deleteTag,
  isTagKind,
  listLanguages,
  listTags,
  updateTag,
} from "../../services/tag.service";
import type { TagKind } from "../../services/tag.service";
import { NotFoundError } from "../../utils/errors";
import { parseIdParam, sendError } from "../../utils/httpErrors";

// /admin/tags/:kind where kind is focus, material or label
function kindParam(req: Request): TagKind {
  const kind = req.params.kind;
  if (!isTagKind(kind)) throw new NotFoundError("Tag kind");
  return kind;
}

function idParam(req: Request, resource: string): number {
  const id = parseIdParam(req.params.id);
  if (id === null) throw new NotFoundError(resource);
  return id;
}

export const getTags = async (req: Request, res: Response): Promise<void> => {
  try {
    res.json(await listTags(kindParam(req)));
  } catch (err) {
    sendError(res, err, "Error listing tags");
  }
};

export const createTagAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    res.status(201).json(await createTag(kindParam(req), req.body));
  } catch (err) {
    sendError(res, err, "Error creating tag");
  }
};

export const updateTagAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    res.json(await updateTag(kindParam(req), idParam(req, "Tag"), req.body));
  } catch (err) {
    sendError(res, err, "Error updating tag");
  }
};

export const deleteTagAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    await deleteTag(kindParam(req), idParam(req, "Tag"));
    res.status(204).send();
  } catch (err) {
    sendError(res, err, "Error deleting tag");
  }
};

export const getLanguages = async (_req: Request, res: Response): Promise<void> => {
  try {
    res.json(await listLanguages());
  } catch (err) {
    sendError(res, err, "Error listing languages");
  }
};

export const createLanguageAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    res.status(201).json(await createLanguage(req.body));
  } catch (err) {
    sendError(res, err, "Error creating language");
  }
};

export const deleteLanguageAdmin = async (req: Request, res: Response): Promise<void> => {
  try {
    await deleteLanguage(idParam(req, "Language"));
    res.status(204).send();
  } catch (err) {
    sendError(res, err, "Error deleting language");
  }
};
