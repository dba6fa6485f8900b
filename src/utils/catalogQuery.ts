import type { ObjectLiteral } from "typeorm";
import {
  CATALOG_PAGE_SIZE,
  MAX_SEARCH_LENGTH,
  isDuration,
  isPlayerCount,
} from "../config/catalog";
import type { Duration, PlayerCount } from "../config/catalog";

/**
 * Filters a catalog request asked for. Empty lists and missing values are
 * not applied.
 */
export interface CatalogQuery {
  search?: string;
  focus: string[];
  playerCount?: PlayerCount;
  duration?: Duration;
  materials: string[];
  labels: string[];
  // Language codes
  languages: string[];
}

export type TagFilterKey = "focus" | "materials" | "labels" | "languages";

interface TagFilter {
  key: TagFilterKey;
  joinTable: string;
  tagColumn: string;
  tagTable: string;
  matchColumn: string;
}

// Many-to-many filters, matched through the join tables declared on Game
export const TAG_FILTERS: readonly TagFilter[] = [
  { key: "focus", joinTable: "game_focus", tagColumn: "focusId", tagTable: "focus", matchColumn: "name" },
  { key: "materials", joinTable: "game_materials", tagColumn: "materialId", tagTable: "material", matchColumn: "name" },
  { key: "labels", joinTable: "game_labels", tagColumn: "labelId", tagTable: "label", matchColumn: "name" },
  { key: "languages", joinTable: "game_languages", tagColumn: "languageId", tagTable: "language", matchColumn: "code" },
];

/**
 * The part of a query builder the catalog filters need. TypeORM's
 * SelectQueryBuilder satisfies it.
 */
export interface ConditionBuilder {
  andWhere(condition: string, parameters?: ObjectLiteral): this;
}

export interface OrderBuilder {
  orderBy(sort: string, order?: "ASC" | "DESC"): this;
  addOrderBy(sort: string, order?: "ASC" | "DESC"): this;
}

export interface PageWindow {
  page: number;
  totalPages: number;
  offset: number;
  limit: number;
}

function coerceToStringArray(input: unknown): string[] {
  const values = Array.isArray(input) ? input : typeof input === "string" ? input.split(",") : [];
  const cleaned = values
    .filter((value): value is string => typeof value === "string")
    .map((value) => value.trim())
    .filter(Boolean);
  return [...new Set(cleaned)];
}

function firstString(input: unknown): string | undefined {
  const value = Array.isArray(input) ? input[0] : input;
  return typeof value === "string" ? value.trim() : undefined;
}

export function parseCatalogQuery(raw: Record<string, unknown>): CatalogQuery {
  const query: CatalogQuery = {
    focus: coerceToStringArray(raw.focus),
    materials: coerceToStringArray(raw.materials),
    labels: coerceToStringArray(raw.labels),
    languages: coerceToStringArray(raw.languages),
  };

  const search = firstString(raw.search);
  if (search) {
    query.search = search.slice(0, MAX_SEARCH_LENGTH);
  }

  // Unknown enumeration values are ignored, same as an absent filter
  const playerCount = firstString(raw.playerCount);
  if (isPlayerCount(playerCount)) {
    query.playerCount = playerCount;
  }

  const duration = firstString(raw.duration);
  if (isDuration(duration)) {
    query.duration = duration;
  }

  return query;
}

/**
 * Page number from a query string value. Anything that is not a whole
 * number counts as the first page.
 */
export function parsePageNumber(input: unknown): number {
  const value = firstString(input);
  if (!value || !/^-?\d+$/.test(value)) return 1;
  return Number(value);
}

/**
 * Clamps a requested page into the available range. An empty result still
 * has one (empty) page.
 */
export function paginate(requestedPage: number, totalItems: number, pageSize = CATALOG_PAGE_SIZE): PageWindow {
  const totalPages = Math.max(1, Math.ceil(totalItems / pageSize));
  const page = Math.min(Math.max(1, Math.trunc(requestedPage) || 1), totalPages);

  return {
    page,
    totalPages,
    offset: (page - 1) * pageSize,
    limit: pageSize,
  };
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, "\\$&");
}

/**
 * Adds the visibility rule and every supplied filter to the builder.
 * Tag filters use EXISTS subqueries so a game matching several tags is
 * returned once.
 */
export function applyCatalogQuery<Q extends ConditionBuilder>(qb: Q, query: CatalogQuery, alias = "game"): Q {
  qb.andWhere(`${alias}.isActive = :isActive`, { isActive: true });
  qb.andWhere(`(${alias}.isSuggestion = :notSuggestion OR ${alias}.approved = :approved)`, {
    notSuggestion: false,
    approved: true,
  });

  if (query.search) {
    qb.andWhere(
      `(${alias}.name ILIKE :search
        OR ${alias}.description ILIKE :search
        OR ${alias}.variants ILIKE :search)`,
      { search: `%${escapeLike(query.search)}%` }
    );
  }

  if (query.playerCount) {
    qb.andWhere(`${alias}.playerCount = :playerCount`, { playerCount: query.playerCount });
  }

  if (query.duration) {
    qb.andWhere(`${alias}.duration = :duration`, { duration: query.duration });
  }

  for (const filter of TAG_FILTERS) {
    const values = query[filter.key];
    if (values.length === 0) continue;

    const join = `gj_${filter.key}`;
    const tag = `tg_${filter.key}`;
    qb.andWhere(
      `EXISTS (
        SELECT 1 FROM "${filter.joinTable}" "${join}"
        INNER JOIN "${filter.tagTable}" "${tag}" ON "${tag}"."id" = "${join}"."${filter.tagColumn}"
        WHERE "${join}"."gameId" = ${alias}.id
          AND "${tag}"."${filter.matchColumn}" IN (:...${filter.key})
      )`,
      { [filter.key]: values }
    );
  }

  return qb;
}

// Name ascending, id as the tie-breaker
export function applyCatalogOrder<Q extends OrderBuilder>(qb: Q, alias = "game"): Q {
  return qb.orderBy(`${alias}.name`, "ASC").addOrderBy(`${alias}.id`, "ASC");
}
