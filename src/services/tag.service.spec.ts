import { Focus } from "../entities/Focus";
import { Label } from "../entities/Label";
import { Language } from "../entities/Language";
import { Material } from "../entities/Material";
import { NotFoundError, ValidationError } from "../utils/errors";
import { createLanguage, createTag, deleteTag, isTagKind, updateTag } from "./tag.service";

const mockGetRepository = jest.fn();

jest.mock("../config/data-source", () => ({
  AppDataSource: {
    getRepository: (...args: unknown[]) => mockGetRepository(...args),
  },
}));

function makeQueryBuilder(existing: unknown) {
  const qb = {
    where: jest.fn(),
    andWhere: jest.fn(),
    getOne: jest.fn(async () => existing),
  };
  qb.where.mockReturnValue(qb);
  qb.andWhere.mockReturnValue(qb);
  return qb;
}

function makeTagRepo(existing: unknown) {
  const qb = makeQueryBuilder(existing);
  return {
    qb,
    createQueryBuilder: jest.fn(() => qb),
    findOne: jest.fn(),
    delete: jest.fn(),
    manager: { save: jest.fn(async <T>(tag: T) => tag) },
  };
}

describe("tag service", () => {
  const dribbling = Object.assign(new Focus(), { id: 1, name: "Dribbling", description: "" });
  let focusRepo: ReturnType<typeof makeTagRepo>;
  let materialRepo: ReturnType<typeof makeTagRepo>;
  let labelRepo: ReturnType<typeof makeTagRepo>;
  const languageRepo = { findBy: jest.fn(), findOneBy: jest.fn(), create: jest.fn(), save: jest.fn() };

  beforeEach(() => {
    focusRepo = makeTagRepo(dribbling);
    materialRepo = makeTagRepo(null);
    labelRepo = makeTagRepo(null);
    mockGetRepository.mockImplementation((entity: unknown) => {
      if (entity === Focus) return focusRepo;
      if (entity === Material) return materialRepo;
      if (entity === Label) return labelRepo;
      if (entity === Language) return languageRepo;
      throw new Error("unexpected repository");
    });
  });

  it("recognizes the three tag kinds", () => {
    expect(isTagKind("focus")).toBe(true);
    expect(isTagKind("label")).toBe(true);
    expect(isTagKind("language")).toBe(false);
  });

  it("rejects a duplicate name within a kind", async () => {
    await expect(createTag("focus", { name: "Dribbling" })).rejects.toMatchObject({
      details: { fieldErrors: { name: ['A focus named "Dribbling" already exists'] } },
    });
    expect(focusRepo.manager.save).not.toHaveBeenCalled();
  });

  it("allows the same name in another kind", async () => {
    const material = await createTag("material", { name: "Dribbling", description: "Cones for the course" });

    expect(material).toBeInstanceOf(Material);
    expect(material).toMatchObject({ name: "Dribbling", description: "Cones for the course", languages: [] });
    expect(materialRepo.qb.where).toHaveBeenCalledWith("tag.name = :name", { name: "Dribbling" });
    expect(materialRepo.qb.andWhere).not.toHaveBeenCalled();
  });

  it("gives labels the default color", async () => {
    const label = await createTag("label", { name: "Warmup" });
    expect(label).toMatchObject({ name: "Warmup", color: "#007bff" });
  });

  it("excludes the tag itself when checking names on update", async () => {
    const existing = Object.assign(new Material(), { id: 3, name: "Ball", description: "", languages: [] });
    materialRepo.findOne.mockImplementation(async () => existing);

    const updated = await updateTag("material", 3, { name: "Balls" });

    expect(updated.name).toBe("Balls");
    expect(materialRepo.qb.andWhere).toHaveBeenCalledWith("tag.id != :id", { id: 3 });
  });

  it("reports a missing tag on update and delete", async () => {
    focusRepo.findOne.mockImplementation(async () => null);
    focusRepo.delete.mockImplementation(async () => ({ affected: 0 }));

    await expect(updateTag("focus", 8, { name: "Speed" })).rejects.toBeInstanceOf(NotFoundError);
    await expect(deleteTag("focus", 8)).rejects.toThrow("Focus not found");
  });

  it("rejects a language code that already exists", async () => {
    languageRepo.findOneBy.mockImplementation(async () => Object.assign(new Language(), { id: 1, code: "de" }));

    await expect(createLanguage({ code: "DE", name: "Deutsch" })).rejects.toBeInstanceOf(ValidationError);
    expect(languageRepo.findOneBy).toHaveBeenCalledWith({ code: "de" });
  });
});
