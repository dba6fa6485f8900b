import { EntityManager } from "typeorm";
import sampleData from "../scripts/data/sample-data.json";
import { AboutContent, ImpressumContent } from "../entities/ContentBlock";
import { Focus } from "../entities/Focus";
import { Game } from "../entities/Game";
import { Label } from "../entities/Label";
import { Language } from "../entities/Language";
import { Material } from "../entities/Material";
import { loadSampleData, populateLanguages, sampleDataSchema } from "./seed.service";

jest.mock("../config/data-source", () => ({ AppDataSource: {} }));

interface Row {
  id: number;
  [key: string]: unknown;
}

// In-memory repository keyed by entity class; findOneBy matches on every given field
function memoryRepo(initial: Row[] = []) {
  const rows = [...initial];
  let nextId = rows.length + 1;
  return {
    rows,
    find: jest.fn(async () => rows),
    findOneBy: jest.fn(async (where: Record<string, unknown>) =>
      rows.find((row) => Object.entries(where).every(([key, value]) => row[key] === value)) ?? null
    ),
    create: jest.fn((data: Record<string, unknown>) => ({ ...data })),
    save: jest.fn(async (data: Record<string, unknown>) => {
      const row: Row = { ...data, id: nextId++ };
      rows.push(row);
      return row;
    }),
  };
}

function memoryManager(seed: Map<unknown, Row[]> = new Map()) {
  const repos = new Map<unknown, ReturnType<typeof memoryRepo>>();
  for (const entity of [Language, Focus, Material, Label, Game, AboutContent, ImpressumContent]) {
    repos.set(entity, memoryRepo(seed.get(entity)));
  }
  const manager = {
    getRepository: (entity: unknown) => {
      const repo = repos.get(entity);
      if (!repo) throw new Error("unexpected repository");
      return repo;
    },
  };
  return { repos, manager: manager as unknown as EntityManager };
}

describe("seed service", () => {
  it("ships sample data that matches its schema", () => {
    expect(sampleDataSchema.safeParse(sampleData).success).toBe(true);
  });

  describe("populateLanguages", () => {
    it("creates English and German once", async () => {
      const { repos, manager } = memoryManager();

      await expect(populateLanguages(manager)).resolves.toEqual({ created: 2, existing: 0 });
      await expect(populateLanguages(manager)).resolves.toEqual({ created: 0, existing: 2 });
      expect(repos.get(Language)?.rows.map((row) => row.code)).toEqual(["en", "de"]);
    });
  });

  describe("loadSampleData", () => {
    const data = {
      focus: [{ name: "Passing" }],
      materials: [{ name: "Ball", description: "One each" }],
      labels: [{ name: "Fun", color: "#ffc107" }],
      games: [
        {
          name: "Chain Passing",
          description: "Pass down the line.",
          playerCount: "9-10",
          duration: "10min",
          focus: ["Passing", "Shooting"],
          materials: ["Ball"],
          labels: ["Fun"],
          languages: ["de"],
        },
      ],
      about: [{ title: "About", content: "Hello" }],
    };

    it("creates tags, games and content and links games to their tags", async () => {
      const { repos, manager } = memoryManager();

      const report = await loadSampleData(manager, data);

      // 3 tags + 1 game + 1 about block; languages are reported by populateLanguages
      expect(report).toEqual({ created: 5, existing: 0 });
      const game = repos.get(Game)?.rows[0];
      expect(game).toMatchObject({ name: "Chain Passing", isActive: true, isSuggestion: false, approved: true });
      expect(game?.focus).toEqual([expect.objectContaining({ name: "Passing" })]);
      expect(game?.languages).toEqual([expect.objectContaining({ code: "de" })]);
      expect(repos.get(AboutContent)?.rows[0]).toMatchObject({ title: "About", isActive: true, order: 0 });
    });

    it("leaves existing rows alone", async () => {
      const { repos, manager } = memoryManager(
        new Map<unknown, Row[]>([
          [Focus, [{ id: 1, name: "Passing" }]],
          [Game, [{ id: 1, name: "Chain Passing" }]],
        ])
      );

      const report = await loadSampleData(manager, data);

      expect(report).toEqual({ created: 3, existing: 2 });
      expect(repos.get(Game)?.rows).toHaveLength(1);
    });

    it("skips a game whose languages do not exist and keeps one with a known language", async () => {
      const { repos, manager } = memoryManager();
      const games = [
        { ...data.games[0], name: "Lost in Translation", languages: ["xx"] },
        { ...data.games[0], name: "Half Known", languages: ["xx", "en"] },
      ];

      const report = await loadSampleData(manager, { ...data, games });

      // 3 tags + 1 game + 1 about block
      expect(report).toEqual({ created: 5, existing: 0 });
      const saved = repos.get(Game)?.rows ?? [];
      expect(saved.map((row) => row.name)).toEqual(["Half Known"]);
      expect(saved[0].languages).toEqual([expect.objectContaining({ code: "en" })]);
    });

    it("rejects malformed data", async () => {
      const { manager } = memoryManager();
      await expect(loadSampleData(manager, { ...data, games: [{ name: "No fields" }] })).rejects.toThrow();
    });
  });
});
