import { SuggestionStatus } from "../entities/GameSuggestion";

export interface SuggestedGameFlags {
  isSuggestion: boolean;
  approved: boolean;
}

/**
 * Visibility flags a suggested game gets when its suggestion moves to a
 * status. Only approval publishes the game; rejected and pending
 * suggestions keep it hidden.
 */
export function flagsForStatus(status: SuggestionStatus, current: SuggestedGameFlags): SuggestedGameFlags {
  switch (status) {
    case SuggestionStatus.APPROVED:
      return { isSuggestion: false, approved: true };
    case SuggestionStatus.REJECTED:
    case SuggestionStatus.PENDING:
      return { isSuggestion: current.isSuggestion, approved: current.approved };
  }
}

/**
 * Public catalog visibility: active and not an unapproved suggestion.
 */
export function isPubliclyVisible(game: SuggestedGameFlags & { isActive: boolean }): boolean {
  return game.isActive && (!game.isSuggestion || game.approved);
}
