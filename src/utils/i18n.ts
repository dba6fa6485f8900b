import en from "../locales/en.json";
import de from "../locales/de.json";
import type { UiLanguage } from "../config/catalog";

export type MessageKey = keyof typeof en;

const catalogs: Record<UiLanguage, Record<MessageKey, string>> = { en, de };

/**
 * Looks up a response message in the visitor's language and fills in
 * `{placeholder}` values.
 */
export function translate(language: UiLanguage, key: MessageKey, params: Record<string, string | number> = {}): string {
  const template = catalogs[language][key] ?? catalogs.en[key];
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in params ? String(params[name]) : match
  );
}
