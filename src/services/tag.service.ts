import { In, Repository } from "typeorm";
import { AppDataSource } from "../config/data-source";
import { Focus } from "../entities/Focus";
import { Material } from "../entities/Material";
import { Label } from "../entities/Label";
import { Language } from "../entities/Language";
import { languageInputSchema, tagInputSchema, tagUpdateSchema } from "../schemas/tag.schema";
import type { TagInput, TagUpdate } from "../schemas/tag.schema";
import { parseInput } from "../schemas/parse";
import { NotFoundError, ValidationError } from "../utils/errors";

export const TAG_KINDS = ["focus", "material", "label"] as const;
export type TagKind = (typeof TAG_KINDS)[number];
export type Tag = Focus | Material | Label;

const TAG_ENTITIES = { focus: Focus, material: Material, label: Label } as const;

const TAG_NAMES: Record<TagKind, string> = { focus: "Focus", material: "Material", label: "Label" };

interface TagRow {
  id?: number;
  name: string;
  languages: Language[];
}

export function isTagKind(value: unknown): value is TagKind {
  return typeof value === "string" && TAG_KINDS.some((kind) => kind === value);
}

async function findLanguages(ids: number[] | undefined): Promise<Language[] | undefined> {
  if (!ids) return undefined;
  if (ids.length === 0) return [];

  const languages = await AppDataSource.getRepository(Language).findBy({ id: In(ids) });
  const found = new Set(languages.map((lang) => lang.id));
  const missing = ids.filter((id) => !found.has(id));
  if (missing.length > 0) {
    throw ValidationError.forField("languageIds", `Unknown id(s): ${missing.join(", ")}`);
  }
  return languages;
}

/**
 * Saves a tag after checking that no other tag of the same kind uses its
 * name. Kinds live in separate tables, so names may repeat across kinds.
 */
async function saveUniqueTag<T extends TagRow>(repo: Repository<T>, tag: T, kind: TagKind): Promise<T> {
  const query = repo.createQueryBuilder("tag").where("tag.name = :name", { name: tag.name });
  if (tag.id !== undefined) {
    query.andWhere("tag.id != :id", { id: tag.id });
  }

  if (await query.getOne()) {
    throw ValidationError.forField("name", `A ${kind} named "${tag.name}" already exists`);
  }
  return repo.manager.save(tag);
}

function applyTagInput(tag: Tag, data: TagUpdate, languages: Language[] | undefined): void {
  if (data.name !== undefined) tag.name = data.name;
  if (languages !== undefined) tag.languages = languages;

  if (tag instanceof Label) {
    if (data.color !== undefined) tag.color = data.color;
  } else if (data.description !== undefined) {
    tag.description = data.description;
  }
}

export async function listTags(kind: TagKind): Promise<Tag[]> {
  const options = { relations: ["languages"], order: { name: "ASC" as const } };
  switch (kind) {
    case "focus":
      return AppDataSource.getRepository(Focus).find(options);
    case "material":
      return AppDataSource.getRepository(Material).find(options);
    case "label":
      return AppDataSource.getRepository(Label).find(options);
  }
}

export async function createTag(kind: TagKind, input: unknown): Promise<Tag> {
  const data: TagInput = parseInput(tagInputSchema, input);
  const languages = (await findLanguages(data.languageIds)) ?? [];

  switch (kind) {
    case "focus": {
      const focus = new Focus();
      applyTagInput(focus, data, languages);
      return saveUniqueTag(AppDataSource.getRepository(Focus), focus, kind);
    }
    case "material": {
      const material = new Material();
      applyTagInput(material, data, languages);
      return saveUniqueTag(AppDataSource.getRepository(Material), material, kind);
    }
    case "label": {
      const label = new Label();
      applyTagInput(label, data, languages);
      return saveUniqueTag(AppDataSource.getRepository(Label), label, kind);
    }
  }
}

export async function updateTag(kind: TagKind, id: number, input: unknown): Promise<Tag> {
  const data = parseInput(tagUpdateSchema, input);
  const languages = await findLanguages(data.languageIds);

  switch (kind) {
    case "focus": {
      const repo = AppDataSource.getRepository(Focus);
      const focus = await repo.findOne({ where: { id }, relations: ["languages"] });
      if (!focus) throw new NotFoundError(TAG_NAMES[kind]);
      applyTagInput(focus, data, languages);
      return saveUniqueTag(repo, focus, kind);
    }
    case "material": {
      const repo = AppDataSource.getRepository(Material);
      const material = await repo.findOne({ where: { id }, relations: ["languages"] });
      if (!material) throw new NotFoundError(TAG_NAMES[kind]);
      applyTagInput(material, data, languages);
      return saveUniqueTag(repo, material, kind);
    }
    case "label": {
      const repo = AppDataSource.getRepository(Label);
      const label = await repo.findOne({ where: { id }, relations: ["languages"] });
      if (!label) throw new NotFoundError(TAG_NAMES[kind]);
      applyTagInput(label, data, languages);
      return saveUniqueTag(repo, label, kind);
    }
  }
}

export async function deleteTag(kind: TagKind, id: number): Promise<void> {
  const result = await AppDataSource.getRepository(TAG_ENTITIES[kind]).delete(id);
  if (!result.affected) throw new NotFoundError(TAG_NAMES[kind]);
}

export async function listLanguages(): Promise<Language[]> {
  return AppDataSource.getRepository(Language).find({ order: { name: "ASC" } });
}

export async function createLanguage(input: unknown): Promise<Language> {
  const data = parseInput(languageInputSchema, input);
  const repo = AppDataSource.getRepository(Language);

  if (await repo.findOneBy({ code: data.code })) {
    throw ValidationError.forField("code", `Language code "${data.code}" already exists`);
  }
  return repo.save(repo.create(data));
}

export async function deleteLanguage(id: number): Promise<void> {
  const result = await AppDataSource.getRepository(Language).delete(id);
  if (!result.affected) throw new NotFoundError("Language");
}
