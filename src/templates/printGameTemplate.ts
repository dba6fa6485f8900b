import { Game } from "../entities/Game";
import { durationToMinutes } from "../utils/duration";
import { escapeHtml, joinNames, multiline, printDocument } from "./layout";

export function renderGameDetails(game: Game): string {
  const materials = joinNames(game.materials);
  const variants = game.variants?.trim();

  return `
    <p class="meta"><strong>Focus:</strong> ${joinNames(game.focus)}</p>
    <p class="meta"><strong>Players:</strong> ${escapeHtml(game.playerCount)}
      &middot; <strong>Duration:</strong> ${escapeHtml(game.duration)} (${durationToMinutes(game.duration)} min)</p>
    ${materials ? `<p class="meta"><strong>Materials:</strong> ${materials}</p>` : ""}
    <p>${multiline(game.description)}</p>
    ${variants ? `<p><strong>Variants:</strong><br>${multiline(variants)}</p>` : ""}
  `;
}

export function generateGamePrintHTML(game: Game): string {
  return printDocument(
    game.name,
    `<h1>${escapeHtml(game.name)}</h1>
    ${renderGameDetails(game)}`
  );
}
