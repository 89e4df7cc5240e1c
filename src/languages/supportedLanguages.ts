import { DEFAULT_SUPPORTED_LANGUAGES } from "../config/defaults.js";
import type { ScanledgerDb } from "../storage/db.js";
import type { SupportedLanguage } from "../types.js";

/** Inserts the given languages (the default set when omitted); existing names are kept. */
export function seedSupportedLanguages(
  db: ScanledgerDb,
  names: readonly string[] = DEFAULT_SUPPORTED_LANGUAGES
): SupportedLanguage[] {
  return db.transaction(() => names.filter((name) => name.trim()).map((name) => db.languages.ensure(name)));
}
