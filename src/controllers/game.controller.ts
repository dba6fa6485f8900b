import { Response } from "express";
import { AuthenticatedRequest } from "../types/express";
import { getCatalogFacets, getGame, listCatalog } from "../services/catalog.service";
import { parseCatalogQuery, parsePageNumber } from "../utils/catalogQuery";
import { parseIdParam, sendError } from "../utils/httpErrors";
import { renderMarkdown } from "../utils/renderMarkdown";

function visitorCart(req: AuthenticatedRequest): readonly number[] {
  return req.visitor?.cart ?? [];
}

// GET /games
export const listGames = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const query = parseCatalogQuery(req.query);
    const [page, facets] = await Promise.all([
      listCatalog(query, parsePageNumber(req.query.page)),
      getCatalogFacets(),
    ]);

    res.json({ ...page, filters: query, facets, cartCount: visitorCart(req).length });
  } catch (err) {
    sendError(res, err, "Error listing games");
  }
};

// GET /games/:id
export const getGameById = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  try {
    const id = parseIdParam(req.params.id);
    if (id === null) {
      res.status(404).json({ error: "Game not found" });
      return;
    }

    const game = await getGame(id);
    const cart = visitorCart(req);
    res.json({
      ...game,
      descriptionHtml: renderMarkdown(game.description),
      variantsHtml: renderMarkdown(game.variants),
      inCart: cart.includes(game.id),
      cartCount: cart.length,
    });
  } catch (err) {
    sendError(res, err, "Error fetching game");
  }
};
