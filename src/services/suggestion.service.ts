import { AppDataSource } from "../config/data-source";
import { logger } from "../config/logger";
import { Game } from "../entities/Game";
import { GameSuggestion, SuggestionStatus } from "../entities/GameSuggestion";
import { gameInputSchema } from "../schemas/game.schema";
import { suggestionReviewSchema } from "../schemas/suggestion.schema";
import { parseInput } from "../schemas/parse";
import { AuthenticationRequiredError, NotFoundError } from "../utils/errors";
import { flagsForStatus } from "../utils/suggestionWorkflow";
import { buildGame } from "./game.service";

const log = logger.child({ module: "suggestions" });

/**
 * Stores a user-submitted game as a hidden suggestion together with its
 * pending GameSuggestion. Invalid input creates nothing.
 */
export async function submitSuggestion(
  input: unknown,
  submitter: { id: number } | null | undefined
): Promise<GameSuggestion> {
  if (!submitter) throw new AuthenticationRequiredError("Log in to suggest a game");
  const data = parseInput(gameInputSchema, input);

  return AppDataSource.transaction(async (manager) => {
    const game = await buildGame(manager, data);
    game.isActive = true;
    game.isSuggestion = true;
    game.approved = false;
    game.suggestedById = submitter.id;
    const saved = await manager.getRepository(Game).save(game);

    const suggestionRepo = manager.getRepository(GameSuggestion);
    const suggestion = await suggestionRepo.save(
      suggestionRepo.create({
        gameId: saved.id,
        submittedById: submitter.id,
        status: SuggestionStatus.PENDING,
        adminNotes: "",
      })
    );
    suggestion.game = saved;

    log.info({ suggestionId: suggestion.id, gameId: saved.id }, `Game suggestion "${saved.name}" submitted`);
    return suggestion;
  });
}

export async function listSuggestions(status?: SuggestionStatus): Promise<GameSuggestion[]> {
  return AppDataSource.getRepository(GameSuggestion).find({
    where: status ? { status } : {},
    relations: ["game", "submittedBy"],
    order: { submittedAt: "DESC" },
  });
}

/**
 * Moves a suggestion to a new status. Approval publishes the linked game;
 * rejection keeps it hidden.
 */
export async function reviewSuggestion(id: number, input: unknown): Promise<GameSuggestion> {
  const { status, adminNotes } = parseInput(suggestionReviewSchema, input);

  return AppDataSource.transaction(async (manager) => {
    const suggestionRepo = manager.getRepository(GameSuggestion);
    const suggestion = await suggestionRepo.findOne({ where: { id }, relations: ["game"] });
    if (!suggestion) throw new NotFoundError("Suggestion");

    const game = suggestion.game;
    const flags = flagsForStatus(status, game);
    if (flags.isSuggestion !== game.isSuggestion || flags.approved !== game.approved) {
      game.isSuggestion = flags.isSuggestion;
      game.approved = flags.approved;
      await manager.getRepository(Game).save(game);
    }

    suggestion.status = status;
    if (adminNotes !== undefined) suggestion.adminNotes = adminNotes;
    const saved = await suggestionRepo.save(suggestion);

    log.info({ suggestionId: id, gameId: game.id, status }, "Suggestion reviewed");
    return saved;
  });
}
