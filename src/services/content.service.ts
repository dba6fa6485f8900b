import { Repository } from "typeorm";
import { AppDataSource } from "../config/data-source";
import { AboutContent, ContentBlock, ImpressumContent } from "../entities/ContentBlock";
import { contentBlockSchema, contentBlockUpdateSchema } from "../schemas/content.schema";
import { parseInput } from "../schemas/parse";
import { NotFoundError } from "../utils/errors";
import { renderMarkdown } from "../utils/renderMarkdown";

export const CONTENT_KINDS = ["about", "impressum"] as const;
export type ContentKind = (typeof CONTENT_KINDS)[number];

export interface RenderedBlock {
  id: number;
  title: string;
  html: string;
  order: number;
}

export function isContentKind(value: unknown): value is ContentKind {
  return typeof value === "string" && CONTENT_KINDS.some((kind) => kind === value);
}

function contentRepository(kind: ContentKind): Repository<ContentBlock> {
  return AppDataSource.getRepository<ContentBlock>(kind === "about" ? AboutContent : ImpressumContent);
}

// Active blocks in display order, markdown rendered to safe HTML
export async function getRenderedBlocks(kind: ContentKind): Promise<RenderedBlock[]> {
  const blocks = await contentRepository(kind).find({
    where: { isActive: true },
    order: { order: "ASC", id: "ASC" },
  });

  return blocks.map((block) => ({
    id: block.id,
    title: block.title,
    html: renderMarkdown(block.content),
    order: block.order,
  }));
}

export async function listBlocks(kind: ContentKind): Promise<ContentBlock[]> {
  return contentRepository(kind).find({ order: { order: "ASC", id: "ASC" } });
}

export async function createBlock(kind: ContentKind, input: unknown): Promise<ContentBlock> {
  const data = parseInput(contentBlockSchema, input);
  const repo = contentRepository(kind);
  return repo.save(repo.create(data));
}

export async function updateBlock(kind: ContentKind, id: number, input: unknown): Promise<ContentBlock> {
  const data = parseInput(contentBlockUpdateSchema, input);
  const repo = contentRepository(kind);

  const block = await repo.findOneBy({ id });
  if (!block) throw new NotFoundError("Content block");

  repo.merge(block, data);
  return repo.save(block);
}

export async function deleteBlock(kind: ContentKind, id: number): Promise<void> {
  const result = await contentRepository(kind).delete(id);
  if (!result.affected) throw new NotFoundError("Content block");
}
