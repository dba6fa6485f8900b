import { EntityManager, In } from "typeorm";
import { AppDataSource } from "../config/data-source";
import { Game } from "../entities/Game";
import { Focus } from "../entities/Focus";
import { Material } from "../entities/Material";
import { Label } from "../entities/Label";
import { Language } from "../entities/Language";
import { gameInputSchema, gameUpdateSchema } from "../schemas/game.schema";
import type { GameInput } from "../schemas/game.schema";
import { parseInput } from "../schemas/parse";
import { NotFoundError, ValidationError } from "../utils/errors";
import { GAME_RELATIONS } from "./catalog.service";

export interface GameRelations {
  focus: Focus[];
  materials: Material[];
  labels: Label[];
  languages: Language[];
}

type RelationIds = Pick<GameInput, "focusIds" | "materialIds" | "labelIds" | "languageIds">;

function assertAllFound(field: string, ids: number[], rows: { id: number }[]): void {
  const found = new Set(rows.map((row) => row.id));
  const missing = ids.filter((id) => !found.has(id));
  if (missing.length > 0) {
    throw ValidationError.forField(field, `Unknown id(s): ${missing.join(", ")}`);
  }
}

async function loadByIds<T extends { id: number }>(
  find: (ids: number[]) => Promise<T[]>,
  field: string,
  ids: number[]
): Promise<T[]> {
  if (ids.length === 0) return [];
  const rows = await find(ids);
  assertAllFound(field, ids, rows);
  return rows;
}

/**
 * Loads the tag and language rows a game input refers to. Unknown ids are a
 * validation error on the matching field.
 */
export async function resolveGameRelations(
  manager: EntityManager,
  ids: Partial<RelationIds>
): Promise<Partial<GameRelations>> {
  const relations: Partial<GameRelations> = {};

  if (ids.focusIds) {
    relations.focus = await loadByIds(
      (list) => manager.getRepository(Focus).findBy({ id: In(list) }), "focusIds", ids.focusIds);
  }
  if (ids.materialIds) {
    relations.materials = await loadByIds(
      (list) => manager.getRepository(Material).findBy({ id: In(list) }), "materialIds", ids.materialIds);
  }
  if (ids.labelIds) {
    relations.labels = await loadByIds(
      (list) => manager.getRepository(Label).findBy({ id: In(list) }), "labelIds", ids.labelIds);
  }
  if (ids.languageIds) {
    relations.languages = await loadByIds(
      (list) => manager.getRepository(Language).findBy({ id: In(list) }), "languageIds", ids.languageIds);
  }

  return relations;
}

/**
 * Builds an unsaved Game from validated input.
 */
export async function buildGame(manager: EntityManager, input: GameInput): Promise<Game> {
  const { focusIds, materialIds, labelIds, languageIds, ...fields } = input;
  const relations = await resolveGameRelations(manager, { focusIds, materialIds, labelIds, languageIds });

  return manager.getRepository(Game).create({
    ...fields,
    focus: relations.focus ?? [],
    materials: relations.materials ?? [],
    labels: relations.labels ?? [],
    languages: relations.languages ?? [],
  });
}

// Admin: every game, suggestions and inactive ones included
export async function listAllGames(): Promise<Game[]> {
  return AppDataSource.getRepository(Game).find({
    relations: [...GAME_RELATIONS],
    order: { name: "ASC", id: "ASC" },
  });
}

export async function createGame(input: unknown, creator: { id: number }): Promise<Game> {
  const data = parseInput(gameInputSchema, input);

  return AppDataSource.transaction(async (manager) => {
    const game = await buildGame(manager, data);
    game.createdById = creator.id;
    game.isActive = true;
    game.isSuggestion = false;
    game.approved = true;
    return manager.getRepository(Game).save(game);
  });
}

export async function updateGame(id: number, input: unknown): Promise<Game> {
  const data = parseInput(gameUpdateSchema, input);

  return AppDataSource.transaction(async (manager) => {
    const repo = manager.getRepository(Game);
    const game = await repo.findOne({ where: { id }, relations: [...GAME_RELATIONS] });
    if (!game) throw new NotFoundError("Game");

    const { focusIds, materialIds, labelIds, languageIds, ...fields } = data;
    if (languageIds && languageIds.length === 0) {
      throw ValidationError.forField("languageIds", "At least one language is required");
    }
    const relations = await resolveGameRelations(manager, { focusIds, materialIds, labelIds, languageIds });

    repo.merge(game, fields);
    Object.assign(game, relations);
    return repo.save(game);
  });
}

// Games stay in saved sessions, so removal from the catalog is a deactivation
export async function deactivateGame(id: number): Promise<Game> {
  const repo = AppDataSource.getRepository(Game);
  const game = await repo.findOneBy({ id });
  if (!game) throw new NotFoundError("Game");

  game.isActive = false;
  return repo.save(game);
}
