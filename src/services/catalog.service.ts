import { In } from "typeorm";
import { AppDataSource } from "../config/data-source";
import { Game } from "../entities/Game";
import { Focus } from "../entities/Focus";
import { Material } from "../entities/Material";
import { Label } from "../entities/Label";
import { Language } from "../entities/Language";
import { CATALOG_PAGE_SIZE, DURATION_CHOICES, PLAYER_COUNT_CHOICES } from "../config/catalog";
import type { Choice, Duration, PlayerCount } from "../config/catalog";
import { applyCatalogOrder, applyCatalogQuery, paginate } from "../utils/catalogQuery";
import type { CatalogQuery } from "../utils/catalogQuery";
import { isPubliclyVisible } from "../utils/suggestionWorkflow";
import { NotFoundError } from "../utils/errors";

export const GAME_RELATIONS = ["focus", "materials", "labels", "languages"] as const;

export interface CatalogPage {
  games: Game[];
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
  hasPrevious: boolean;
  hasNext: boolean;
}

export interface CatalogFacets {
  focus: Focus[];
  materials: Material[];
  labels: Label[];
  languages: Language[];
  playerCounts: Choice<PlayerCount>[];
  durations: Choice<Duration>[];
}

export async function listCatalog(query: CatalogQuery, requestedPage: number): Promise<CatalogPage> {
  const repo = AppDataSource.getRepository(Game);

  const totalItems = await applyCatalogQuery(repo.createQueryBuilder("game"), query).getCount();
  const window = paginate(requestedPage, totalItems, CATALOG_PAGE_SIZE);

  const listing = applyCatalogOrder(applyCatalogQuery(repo.createQueryBuilder("game"), query));
  for (const relation of GAME_RELATIONS) {
    listing.leftJoinAndSelect(`game.${relation}`, relation);
  }
  const games = await listing.skip(window.offset).take(window.limit).getMany();

  return {
    games,
    page: window.page,
    pageSize: window.limit,
    totalItems,
    totalPages: window.totalPages,
    hasPrevious: window.page > 1,
    hasNext: window.page < window.totalPages,
  };
}

export async function getCatalogFacets(): Promise<CatalogFacets> {
  const [focus, materials, labels, languages] = await Promise.all([
    AppDataSource.getRepository(Focus).find({ order: { name: "ASC" } }),
    AppDataSource.getRepository(Material).find({ order: { name: "ASC" } }),
    AppDataSource.getRepository(Label).find({ order: { name: "ASC" } }),
    AppDataSource.getRepository(Language).find({ order: { name: "ASC" } }),
  ]);

  return {
    focus,
    materials,
    labels,
    languages,
    playerCounts: PLAYER_COUNT_CHOICES,
    durations: DURATION_CHOICES,
  };
}

/**
 * A single game as the public catalog sees it. Inactive games and
 * unapproved suggestions are reported as not found.
 */
export async function getGame(id: number): Promise<Game> {
  if (!Number.isInteger(id) || id <= 0) throw new NotFoundError("Game");

  const game = await AppDataSource.getRepository(Game).findOne({
    where: { id },
    relations: [...GAME_RELATIONS],
  });

  if (!game || !isPubliclyVisible(game)) throw new NotFoundError("Game");
  return game;
}

/**
 * Visible games among the given ids, in no particular order.
 */
export async function findVisibleGames(ids: readonly number[]): Promise<Game[]> {
  if (ids.length === 0) return [];

  const games = await AppDataSource.getRepository(Game).find({
    where: { id: In([...ids]) },
    relations: [...GAME_RELATIONS],
  });
  return games.filter(isPubliclyVisible);
}
