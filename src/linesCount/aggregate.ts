import type {
  LanguageLinesCount,
  LinesCounters,
  ProjectLinesCount,
  SccLanguageEntry,
  SupportedLanguage
} from "../types.js";

export function emptyCounters(): LinesCounters {
  return {
    fileCount: 0,
    lineCount: 0,
    blankCount: 0,
    commentCount: 0,
    codeCount: 0,
    complexityCount: 0
  };
}

/** Builds a ProjectLinesCount from line counter output, keeping the tool's language order. */
export function aggregateLinesCount(entries: ReadonlyArray<SccLanguageEntry>): ProjectLinesCount {
  const totals = emptyCounters();
  const languages: LanguageLinesCount[] = [];

  for (const entry of entries) {
    languages.push({
      language: entry.Name,
      fileCount: entry.Count,
      lineCount: entry.Lines,
      blankCount: entry.Blank,
      commentCount: entry.Comment,
      codeCount: entry.Code,
      complexityCount: entry.Complexity
    });
    totals.fileCount += entry.Count;
    totals.lineCount += entry.Lines;
    totals.blankCount += entry.Blank;
    totals.commentCount += entry.Comment;
    totals.codeCount += entry.Code;
    totals.complexityCount += entry.Complexity;
  }

  return { totals, languages };
}

function sortByCodeCountDesc(languages: ReadonlyArray<LanguageLinesCount>): LanguageLinesCount[] {
  // Array.prototype.sort is stable, so ties keep the tool's order.
  return [...languages].sort((a, b) => b.codeCount - a.codeCount);
}

export function topLanguages(linesCount: ProjectLinesCount, top: number): LanguageLinesCount[] {
  const limit = Math.max(0, Math.trunc(top));
  return sortByCodeCountDesc(linesCount.languages).slice(0, limit);
}

/**
 * Supported languages detected in the project, most present first. A detected
 * language matching several supported languages contributes each of them.
 */
export function topSupportedLanguages(
  linesCount: ProjectLinesCount,
  supportedLanguages: ReadonlyArray<SupportedLanguage>
): SupportedLanguage[] {
  const result: SupportedLanguage[] = [];
  for (const language of sortByCodeCountDesc(linesCount.languages)) {
    const name = language.language.toLowerCase();
    for (const supported of supportedLanguages) {
      if (supported.name.toLowerCase() === name) {
        result.push(supported);
      }
    }
  }
  return result;
}
