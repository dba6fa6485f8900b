import type { ObjectLiteral } from "typeorm";
import {
  applyCatalogOrder,
  applyCatalogQuery,
  paginate,
  parseCatalogQuery,
  parsePageNumber,
} from "./catalogQuery";
import type { CatalogQuery, ConditionBuilder, OrderBuilder } from "./catalogQuery";

class RecordingBuilder implements ConditionBuilder, OrderBuilder {
  conditions: { condition: string; parameters?: ObjectLiteral }[] = [];
  orders: string[] = [];

  andWhere(condition: string, parameters?: ObjectLiteral): this {
    this.conditions.push({ condition, parameters });
    return this;
  }

  orderBy(sort: string, order?: "ASC" | "DESC"): this {
    this.orders = [`${sort} ${order}`];
    return this;
  }

  addOrderBy(sort: string, order?: "ASC" | "DESC"): this {
    this.orders.push(`${sort} ${order}`);
    return this;
  }
}

const emptyQuery: CatalogQuery = { focus: [], materials: [], labels: [], languages: [] };

describe("parseCatalogQuery", () => {
  it("splits comma lists, trims and drops repeats", () => {
    const query = parseCatalogQuery({
      focus: "Dribbling, Passing,Dribbling",
      materials: ["Ball", " Cones "],
      search: "  tag  ",
      duration: "10+min",
    });

    expect(query).toEqual({
      focus: ["Dribbling", "Passing"],
      materials: ["Ball", "Cones"],
      labels: [],
      languages: [],
      search: "tag",
      duration: "10+min",
    });
  });

  it("ignores values outside the enumerations", () => {
    const query = parseCatalogQuery({ playerCount: "99", duration: "forever" });
    expect(query.playerCount).toBeUndefined();
    expect(query.duration).toBeUndefined();
  });

  it("caps the search term at 100 characters", () => {
    const query = parseCatalogQuery({ search: "a".repeat(150) });
    expect(query.search).toHaveLength(100);
  });
});

describe("parsePageNumber", () => {
  it("reads whole numbers and treats anything else as page 1", () => {
    expect(parsePageNumber("3")).toBe(3);
    expect(parsePageNumber(["2", "5"])).toBe(2);
    expect(parsePageNumber("-4")).toBe(-4);
    expect(parsePageNumber("abc")).toBe(1);
    expect(parsePageNumber("2.5")).toBe(1);
    expect(parsePageNumber(undefined)).toBe(1);
  });
});

describe("paginate", () => {
  it("clamps pages above the last page", () => {
    expect(paginate(99, 30)).toEqual({ page: 3, totalPages: 3, offset: 24, limit: 12 });
  });

  it("clamps pages below 1", () => {
    expect(paginate(0, 30).page).toBe(1);
    expect(paginate(-4, 30).page).toBe(1);
  });

  it("has one page for an empty result", () => {
    expect(paginate(5, 0)).toEqual({ page: 1, totalPages: 1, offset: 0, limit: 12 });
  });

  it("starts the second page after the first 12 items", () => {
    expect(paginate(2, 13)).toEqual({ page: 2, totalPages: 2, offset: 12, limit: 12 });
  });
});

describe("applyCatalogQuery", () => {
  it("always applies the visibility rule", () => {
    const qb = applyCatalogQuery(new RecordingBuilder(), emptyQuery);

    expect(qb.conditions).toEqual([
      { condition: "game.isActive = :isActive", parameters: { isActive: true } },
      {
        condition: "(game.isSuggestion = :notSuggestion OR game.approved = :approved)",
        parameters: { notSuggestion: false, approved: true },
      },
    ]);
  });

  it("adds enumeration filters as equality conditions", () => {
    const qb = applyCatalogQuery(new RecordingBuilder(), { ...emptyQuery, playerCount: "5-6", duration: "15min" });

    expect(qb.conditions.slice(2)).toEqual([
      { condition: "game.playerCount = :playerCount", parameters: { playerCount: "5-6" } },
      { condition: "game.duration = :duration", parameters: { duration: "15min" } },
    ]);
  });

  it("escapes LIKE wildcards in the search term", () => {
    const qb = applyCatalogQuery(new RecordingBuilder(), { ...emptyQuery, search: "50%_off" });

    expect(qb.conditions).toHaveLength(3);
    expect(qb.conditions[2].parameters).toEqual({ search: "%50\\%\\_off%" });
  });

  it("matches tags through an EXISTS subquery on the join table", () => {
    const qb = applyCatalogQuery(new RecordingBuilder(), {
      ...emptyQuery,
      focus: ["Dribbling", "Passing"],
      languages: ["de"],
    });

    expect(qb.conditions).toHaveLength(4);

    const [focus, languages] = qb.conditions.slice(2);
    expect(focus.parameters).toEqual({ focus: ["Dribbling", "Passing"] });
    expect(focus.condition).toContain('FROM "game_focus" "gj_focus"');
    expect(focus.condition).toContain('"tg_focus"."name" IN (:...focus)');
    expect(languages.parameters).toEqual({ languages: ["de"] });
    expect(languages.condition).toContain('"tg_languages"."code" IN (:...languages)');
  });
});

describe("applyCatalogOrder", () => {
  it("orders by name with id as tie-breaker", () => {
    const qb = applyCatalogOrder(new RecordingBuilder());
    expect(qb.orders).toEqual(["game.name ASC", "game.id ASC"]);
  });
});
