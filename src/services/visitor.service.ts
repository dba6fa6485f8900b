import { EntityManager } from "typeorm";
import { AppDataSource } from "../config/data-source";
import { VisitorSession } from "../entities/VisitorSession";
import { DEFAULT_LANGUAGE, isSupportedLanguage } from "../config/catalog";
import type { UiLanguage } from "../config/catalog";
import { normalizeCart } from "../utils/sessionCart";

/**
 * Per-browser state loaded for a request. Handlers change it in place and
 * set `modified` so it gets written back.
 */
export interface VisitorState {
  sessionId: string;
  cart: number[];
  language: UiLanguage;
  modified: boolean;
}

export async function loadVisitor(sessionId: string): Promise<VisitorState> {
  const row = await AppDataSource.getRepository(VisitorSession).findOneBy({ id: sessionId });
  const language = row?.language;

  return {
    sessionId,
    cart: normalizeCart(row?.cart),
    language: isSupportedLanguage(language) ? language : DEFAULT_LANGUAGE,
    modified: false,
  };
}

/**
 * Writes modified state back. Pass `manager` to write inside a running
 * transaction.
 */
export async function saveVisitor(state: VisitorState, manager?: EntityManager): Promise<void> {
  if (!state.modified) return;

  const repo = manager ? manager.getRepository(VisitorSession) : AppDataSource.getRepository(VisitorSession);
  await repo.save({
    id: state.sessionId,
    cart: state.cart,
    language: state.language,
  });
  state.modified = false;
}

/**
 * Switches the visitor's UI language. Unsupported codes are ignored and the
 * current language stays. Returns whether the language was accepted.
 */
export function setLanguage(state: VisitorState, code: unknown): boolean {
  if (!isSupportedLanguage(code)) return false;

  if (state.language !== code) {
    state.language = code;
    state.modified = true;
  }
  return true;
}
