import { LinesCountOutputError } from "../errors/tool.errors.js";
import { runTool, type ToolSettings } from "../tools/runCommand.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { ProjectLinesCount, SccLanguageEntry } from "../types.js";
import { aggregateLinesCount } from "./aggregate.js";

const NUMERIC_FIELDS = ["Count", "Lines", "Blank", "Comment", "Code", "Complexity"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readCounter(entry: Record<string, unknown>, field: string, index: number): number {
  const value = entry[field];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new LinesCountOutputError(`entry ${index} has an invalid "${field}" (${JSON.stringify(value)}).`);
  }
  return value;
}

export function parseSccOutput(raw: string): SccLanguageEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new LinesCountOutputError(`not JSON (${message}).`);
  }
  // scc prints `null` when it finds no source file at all.
  if (parsed === null) return [];
  if (!Array.isArray(parsed)) {
    throw new LinesCountOutputError("expected a JSON array.");
  }

  return parsed.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new LinesCountOutputError(`entry ${index} is not an object.`);
    }
    const name = entry.Name;
    if (typeof name !== "string" || !name.trim()) {
      throw new LinesCountOutputError(`entry ${index} has no "Name".`);
    }
    const [Count, Lines, Blank, Comment, Code, Complexity] = NUMERIC_FIELDS.map((field) =>
      readCounter(entry, field, index)
    );
    return { Name: name, Count, Lines, Blank, Comment, Code, Complexity };
  });
}

export interface CountLinesParams {
  sourcePath: string;
  scc?: ToolSettings;
  logger?: Logger;
}

/** Runs scc against an extracted source tree and aggregates its per-language output. */
export async function countLines(params: CountLinesParams): Promise<ProjectLinesCount> {
  const logger = params.logger ?? noopLogger;
  logger.debug("Counting lines", { sourcePath: params.sourcePath });
  const result = await runTool("scc", [params.sourcePath, "-f", "json"], params.scc);
  const linesCount = aggregateLinesCount(parseSccOutput(result.stdout));
  logger.info("Lines counted", {
    sourcePath: params.sourcePath,
    languages: linesCount.languages.length,
    codeCount: linesCount.totals.codeCount,
    durationMs: result.durationMs
  });
  return linesCount;
}
