import { Request, Response } from "express";
import { getRenderedBlocks } from "../services/content.service";
import type { ContentKind } from "../services/content.service";
import { sendError } from "../utils/httpErrors";

// GET /content/about, GET /content/impressum
export const getContentPage = (kind: ContentKind) => async (_req: Request, res: Response): Promise<void> => {
  try {
    res.json(await getRenderedBlocks(kind));
  } catch (err) {
    sendError(res, err, `Error fetching ${kind} content`);
  }
};
