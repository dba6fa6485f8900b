import { EntityManager } from "typeorm";
import { z } from "zod";
import { logger } from "../config/logger";
import { DURATION_VALUES, PLAYER_COUNT_VALUES, SUPPORTED_LANGUAGES } from "../config/catalog";
import { AboutContent, ContentBlock, ImpressumContent } from "../entities/ContentBlock";
import { Focus } from "../entities/Focus";
import { Game } from "../entities/Game";
import { Label } from "../entities/Label";
import { Language } from "../entities/Language";
import { Material } from "../entities/Material";

const log = logger.child({ module: "seed" });

const describedTag = z.object({ name: z.string().min(1), description: z.string().default("") });

export const sampleDataSchema = z.object({
  focus: z.array(describedTag),
  materials: z.array(describedTag),
  labels: z.array(z.object({ name: z.string().min(1), color: z.string().regex(/^#[0-9a-fA-F]{6}$/) })),
  games: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().min(1),
      playerCount: z.enum(PLAYER_COUNT_VALUES),
      duration: z.enum(DURATION_VALUES),
      focus: z.array(z.string()).default([]),
      materials: z.array(z.string()).default([]),
      labels: z.array(z.string()).default([]),
      variants: z.string().default(""),
      languages: z.array(z.string()).min(1),
    })
  ),
  about: z.array(z.object({ title: z.string(), content: z.string() })).default([]),
  impressum: z.array(z.object({ title: z.string(), content: z.string() })).default([]),
});

export type SampleData = z.infer<typeof sampleDataSchema>;

export interface SeedReport {
  created: number;
  existing: number;
}

/**
 * Get-or-create the UI languages. Running it again changes nothing.
 */
export async function populateLanguages(manager: EntityManager): Promise<SeedReport> {
  const repo = manager.getRepository(Language);
  const report: SeedReport = { created: 0, existing: 0 };

  for (const { code, name } of SUPPORTED_LANGUAGES) {
    const existing = await repo.findOneBy({ code });
    if (existing) {
      report.existing++;
      continue;
    }
    await repo.save(repo.create({ code, name }));
    log.info(`Created language: ${name} (${code})`);
    report.created++;
  }

  return report;
}

function pick<T>(rows: Map<string, T>, names: string[], kind: string, gameName: string): T[] {
  const found: T[] = [];
  for (const name of names) {
    const row = rows.get(name);
    if (row) {
      found.push(row);
    } else {
      log.warn(`${kind} "${name}" not found for game "${gameName}"`);
    }
  }
  return found;
}

/**
 * Get-or-create sample tags, games and content blocks by name. Existing rows
 * are left untouched.
 */
export async function loadSampleData(manager: EntityManager, input: unknown): Promise<SeedReport> {
  const data = sampleDataSchema.parse(input);
  const report: SeedReport = { created: 0, existing: 0 };

  await populateLanguages(manager);
  const languages = await manager.getRepository(Language).find();
  const languagesByCode = new Map(languages.map((language) => [language.code, language]));

  const focusRepo = manager.getRepository(Focus);
  const focus = new Map<string, Focus>();
  for (const row of data.focus) {
    let tag = await focusRepo.findOneBy({ name: row.name });
    if (tag) report.existing++;
    else {
      tag = await focusRepo.save(focusRepo.create({ ...row, languages }));
      report.created++;
    }
    focus.set(tag.name, tag);
  }

  const materialRepo = manager.getRepository(Material);
  const materials = new Map<string, Material>();
  for (const row of data.materials) {
    let tag = await materialRepo.findOneBy({ name: row.name });
    if (tag) report.existing++;
    else {
      tag = await materialRepo.save(materialRepo.create({ ...row, languages }));
      report.created++;
    }
    materials.set(tag.name, tag);
  }

  const labelRepo = manager.getRepository(Label);
  const labels = new Map<string, Label>();
  for (const row of data.labels) {
    let tag = await labelRepo.findOneBy({ name: row.name });
    if (tag) report.existing++;
    else {
      tag = await labelRepo.save(labelRepo.create({ ...row, languages }));
      report.created++;
    }
    labels.set(tag.name, tag);
  }

  const gameRepo = manager.getRepository(Game);
  for (const row of data.games) {
    if (await gameRepo.findOneBy({ name: row.name })) {
      report.existing++;
      continue;
    }

    const languageRows = pick(languagesByCode, row.languages, "Language", row.name);
    if (languageRows.length === 0) {
      log.warn(`Skipping game "${row.name}": none of its languages exist`);
      continue;
    }

    await gameRepo.save(
      gameRepo.create({
        name: row.name,
        description: row.description,
        playerCount: row.playerCount,
        duration: row.duration,
        variants: row.variants,
        focus: pick(focus, row.focus, "Focus", row.name),
        materials: pick(materials, row.materials, "Material", row.name),
        labels: pick(labels, row.labels, "Label", row.name),
        languages: languageRows,
        isActive: true,
        isSuggestion: false,
        approved: true,
      })
    );
    log.info(`Created game: ${row.name}`);
    report.created++;
  }

  const blockSets = [
    { repo: manager.getRepository<ContentBlock>(AboutContent), rows: data.about },
    { repo: manager.getRepository<ContentBlock>(ImpressumContent), rows: data.impressum },
  ];
  for (const { repo, rows } of blockSets) {
    for (const [index, row] of rows.entries()) {
      if (await repo.findOneBy({ title: row.title })) {
        report.existing++;
        continue;
      }
      await repo.save(repo.create({ ...row, isActive: true, order: index }));
      report.created++;
    }
  }

  return report;
}
