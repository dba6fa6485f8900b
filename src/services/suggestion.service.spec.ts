import { Game } from "../entities/Game";
import { GameSuggestion, SuggestionStatus } from "../entities/GameSuggestion";
import { Language } from "../entities/Language";
import { AuthenticationRequiredError, NotFoundError, ValidationError } from "../utils/errors";
import { reviewSuggestion, submitSuggestion } from "./suggestion.service";

const mockTransaction = jest.fn();

jest.mock("../config/data-source", () => ({
  AppDataSource: {
    transaction: (...args: unknown[]) => mockTransaction(...args),
    getRepository: jest.fn(),
  },
}));

describe("suggestion service", () => {
  const english = Object.assign(new Language(), { id: 1, code: "en", name: "English" });

  const gameRepo = {
    create: jest.fn((data: Partial<Game>) => Object.assign(new Game(), data)),
    save: jest.fn(async (game: Game) => Object.assign(game, { id: game.id ?? 30 })),
  };
  const suggestionRepo = {
    create: jest.fn((data: Partial<GameSuggestion>) => Object.assign(new GameSuggestion(), data)),
    save: jest.fn(async (suggestion: GameSuggestion) => Object.assign(suggestion, { id: suggestion.id ?? 5 })),
    findOne: jest.fn(),
  };
  const languageRepo = { findBy: jest.fn() };
  const manager = {
    getRepository: jest.fn((entity: unknown) => {
      if (entity === Game) return gameRepo;
      if (entity === GameSuggestion) return suggestionRepo;
      if (entity === Language) return languageRepo;
      throw new Error("unexpected repository");
    }),
  };

  const validInput = {
    name: "Mirror Drill",
    description: "Pairs copy each other's footwork.",
    playerCount: "3-4",
    duration: "10min",
    languageIds: [1],
  };

  beforeEach(() => {
    mockTransaction.mockImplementation((work: (m: typeof manager) => Promise<unknown>) => work(manager));
    languageRepo.findBy.mockImplementation(async () => [english]);
  });

  describe("submitSuggestion", () => {
    it("stores a hidden game and a pending suggestion", async () => {
      const suggestion = await submitSuggestion(validInput, { id: 9 });

      const game = gameRepo.save.mock.calls[0][0];
      expect(game).toMatchObject({
        name: "Mirror Drill",
        isActive: true,
        isSuggestion: true,
        approved: false,
        suggestedById: 9,
      });
      expect(game.languages).toEqual([english]);
      expect(suggestionRepo.create).toHaveBeenCalledWith({
        gameId: 30,
        submittedById: 9,
        status: SuggestionStatus.PENDING,
        adminNotes: "",
      });
      expect(suggestion.status).toBe(SuggestionStatus.PENDING);
    });

    it("writes nothing when a required field is missing", async () => {
      await expect(submitSuggestion({ ...validInput, name: "" }, { id: 9 })).rejects.toBeInstanceOf(ValidationError);
      expect(mockTransaction).not.toHaveBeenCalled();
      expect(gameRepo.save).not.toHaveBeenCalled();
    });

    it("requires at least one language", async () => {
      await expect(submitSuggestion({ ...validInput, languageIds: [] }, { id: 9 })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it("rejects unknown language ids", async () => {
      languageRepo.findBy.mockImplementation(async () => []);

      await expect(submitSuggestion(validInput, { id: 9 })).rejects.toMatchObject({
        details: { fieldErrors: { languageIds: ["Unknown id(s): 1"] } },
      });
      expect(gameRepo.save).not.toHaveBeenCalled();
    });

    it("requires a logged-in submitter", async () => {
      await expect(submitSuggestion(validInput, undefined)).rejects.toBeInstanceOf(AuthenticationRequiredError);
    });
  });

  describe("reviewSuggestion", () => {
    function pendingSuggestion(): GameSuggestion {
      const game = Object.assign(new Game(), { id: 30, isActive: true, isSuggestion: true, approved: false });
      return Object.assign(new GameSuggestion(), { id: 5, gameId: 30, game, status: SuggestionStatus.PENDING, adminNotes: "" });
    }

    it("publishes the game on approval", async () => {
      suggestionRepo.findOne.mockImplementation(async () => pendingSuggestion());

      const reviewed = await reviewSuggestion(5, { status: "approved", adminNotes: "Nice one" });

      expect(gameRepo.save).toHaveBeenCalledTimes(1);
      expect(reviewed.game).toMatchObject({ isSuggestion: false, approved: true });
      expect(reviewed.status).toBe(SuggestionStatus.APPROVED);
      expect(reviewed.adminNotes).toBe("Nice one");
    });

    it("keeps the game hidden on rejection", async () => {
      suggestionRepo.findOne.mockImplementation(async () => pendingSuggestion());

      const reviewed = await reviewSuggestion(5, { status: "rejected" });

      expect(gameRepo.save).not.toHaveBeenCalled();
      expect(reviewed.game).toMatchObject({ isSuggestion: true, approved: false });
      expect(reviewed.status).toBe(SuggestionStatus.REJECTED);
      expect(reviewed.adminNotes).toBe("");
    });

    it("rejects an unknown status", async () => {
      await expect(reviewSuggestion(5, { status: "archived" })).rejects.toBeInstanceOf(ValidationError);
    });

    it("reports a missing suggestion", async () => {
      suggestionRepo.findOne.mockImplementation(async () => null);
      await expect(reviewSuggestion(5, { status: "approved" })).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
