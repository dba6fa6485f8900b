import { format } from "date-fns";
import type { SessionPlan, SessionPlanEntry } from "../utils/sessionPlan";
import { durationToMinutes } from "../utils/duration";
import { escapeHtml, multiline, printDocument } from "./layout";
import { renderGameDetails } from "./printGameTemplate";

function formatMinutes(minutes: number): string {
  return Number.isInteger(minutes) ? String(minutes) : minutes.toFixed(1);
}

function renderEntry(entry: SessionPlanEntry): string {
  const planned = durationToMinutes(entry.game.duration) * entry.durationMultiplier;
  const multiplier = entry.durationMultiplier !== 1 ? ` &times; ${entry.durationMultiplier}` : "";

  return `
  <div class="game">
    <h2>${entry.order}. ${escapeHtml(entry.game.name)}</h2>
    <p class="meta">Planned time: ${formatMinutes(planned)} min${multiplier}</p>
    ${renderGameDetails(entry.game)}
    ${entry.notes ? `<p class="notes">${multiline(entry.notes)}</p>` : ""}
  </div>`;
}

export function generateSessionPrintHTML(plan: SessionPlan): string {
  const created = plan.createdAt ? `<p class="meta">Created ${format(plan.createdAt, "yyyy-MM-dd")}</p>` : "";

  return printDocument(
    plan.name,
    `<h1>${escapeHtml(plan.name)}</h1>
    ${created}
    <p class="meta">${plan.entries.length} games &middot; Total duration: ${formatMinutes(plan.totalMinutes)} minutes</p>
    ${plan.description ? `<p>${multiline(plan.description)}</p>` : ""}
    ${plan.entries.map(renderEntry).join("\n")}`
  );
}
