import { EntityManager } from "typeorm";
import { VisitorSession } from "../entities/VisitorSession";
import { loadVisitor, saveVisitor, setLanguage } from "./visitor.service";
import type { VisitorState } from "./visitor.service";

const mockRepo = { findOneBy: jest.fn(), save: jest.fn() };

jest.mock("../config/data-source", () => ({
  AppDataSource: {
    getRepository: () => mockRepo,
  },
}));

const SESSION_ID = "6f1c1b7e-2f43-4c7f-9a39-0c1e1f0f7a11";

function freshState(): VisitorState {
  return { sessionId: SESSION_ID, cart: [], language: "en", modified: false };
}

describe("visitor service", () => {
  it("starts a new visitor with an empty cart in the default language", async () => {
    mockRepo.findOneBy.mockImplementation(async () => null);

    await expect(loadVisitor(SESSION_ID)).resolves.toEqual(freshState());
  });

  it("restores the stored cart and language", async () => {
    mockRepo.findOneBy.mockImplementation(async () =>
      Object.assign(new VisitorSession(), { id: SESSION_ID, cart: [4, 2], language: "de" })
    );

    const state = await loadVisitor(SESSION_ID);
    expect(state.cart).toEqual([4, 2]);
    expect(state.language).toBe("de");
  });

  it("falls back to the default for a stored language that is no longer offered", async () => {
    mockRepo.findOneBy.mockImplementation(async () =>
      Object.assign(new VisitorSession(), { id: SESSION_ID, cart: [], language: "fr" })
    );

    expect((await loadVisitor(SESSION_ID)).language).toBe("en");
  });

  describe("setLanguage", () => {
    it("switches to a supported language", () => {
      const state = freshState();

      expect(setLanguage(state, "de")).toBe(true);
      expect(state).toMatchObject({ language: "de", modified: true });
    });

    it("silently ignores unsupported codes", () => {
      const state = freshState();

      expect(setLanguage(state, "fr")).toBe(false);
      expect(setLanguage(state, undefined)).toBe(false);
      expect(state).toMatchObject({ language: "en", modified: false });
    });
  });

  describe("saveVisitor", () => {
    it("writes only modified state", async () => {
      const state = freshState();
      await saveVisitor(state);
      expect(mockRepo.save).not.toHaveBeenCalled();

      state.cart = [1];
      state.modified = true;
      await saveVisitor(state);

      expect(mockRepo.save).toHaveBeenCalledWith({ id: SESSION_ID, cart: [1], language: "en" });
      expect(state.modified).toBe(false);
    });

    it("writes through a transaction manager when given one", async () => {
      const txRepo = { save: jest.fn() };
      const manager = { getRepository: jest.fn(() => txRepo) };
      const state = { ...freshState(), cart: [2], modified: true };

      await saveVisitor(state, manager as unknown as EntityManager);

      expect(manager.getRepository).toHaveBeenCalledWith(VisitorSession);
      expect(txRepo.save).toHaveBeenCalledWith({ id: SESSION_ID, cart: [2], language: "en" });
      expect(mockRepo.save).not.toHaveBeenCalled();
    });
  });
});
