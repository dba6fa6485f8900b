/**
 * Catalog configuration
 *
 * Enumerations and limits shared by the catalog, the cart and the
 * training-session editor.
 */

// Games per catalog page
export const CATALOG_PAGE_SIZE = 12;

// Longest search string the catalog will run
export const MAX_SEARCH_LENGTH = 100;

// Duration labels. Open-ended labels ("10+min") count their stated minimum.
export const DURATION_VALUES = [
  "5min",
  "10min",
  "15min",
  "20min",
  "30min",
  "45min",
  "60min",
  "90min",
  "120min",
  "10+min",
  "15+min",
  "20+min",
  "30+min",
] as const;

export type Duration = (typeof DURATION_VALUES)[number];

export const DURATION_MINUTES: Record<Duration, number> = {
  "5min": 5,
  "10min": 10,
  "15min": 15,
  "20min": 20,
  "30min": 30,
  "45min": 45,
  "60min": 60,
  "90min": 90,
  "120min": 120,
  "10+min": 10,
  "15+min": 15,
  "20+min": 20,
  "30+min": 30,
};

export const PLAYER_COUNT_VALUES = ["1-2", "3-4", "5-6", "7-8", "9-10", "11-12", "13+", "any"] as const;

export type PlayerCount = (typeof PLAYER_COUNT_VALUES)[number];

export interface Choice<T extends string> {
  value: T;
  label: string;
}

export const DURATION_CHOICES: Choice<Duration>[] = DURATION_VALUES.map((value) => ({
  value,
  label: value.replace("min", " minutes"),
}));

export const PLAYER_COUNT_CHOICES: Choice<PlayerCount>[] = PLAYER_COUNT_VALUES.map((value) => ({
  value,
  label: value === "any" ? "Any number" : `${value} players`,
}));

export function isDuration(value: unknown): value is Duration {
  return typeof value === "string" && DURATION_VALUES.some((d) => d === value);
}

export function isPlayerCount(value: unknown): value is PlayerCount {
  return typeof value === "string" && PLAYER_COUNT_VALUES.some((p) => p === value);
}

// Session entry duration multiplier (0.5 = half time, 2.0 = double time)
export const DURATION_MULTIPLIER = {
  MIN: 0.5,
  MAX: 3.0,
  DEFAULT: 1.0,
} as const;

// UI languages a visitor can switch between
export const SUPPORTED_LANGUAGES = [
  { code: "en", name: "English" },
  { code: "de", name: "Deutsch" },
] as const;

export type UiLanguage = (typeof SUPPORTED_LANGUAGES)[number]["code"];

export const DEFAULT_LANGUAGE: UiLanguage = "en";

export function isSupportedLanguage(code: unknown): code is UiLanguage {
  return typeof code === "string" && SUPPORTED_LANGUAGES.some((lang) => lang.code === code);
}
