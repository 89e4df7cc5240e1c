import path from "node:path";
import { copyFile, mkdir, rm } from "node:fs/promises";
import { ARCHIVE_FILE_NAME, EXTRACT_FOLDER_NAME } from "../config/defaults.js";
import { isDuplicateArchiveCheckEnabled } from "../config/featureFlags.js";
import { ArchiveDuplicateError } from "../errors/archive.errors.js";
import { ProjectNotFoundError } from "../errors/storage.errors.js";
import { countLines } from "../linesCount/scc.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { computeRiskLevel, countOccurrences } from "../scoring/riskScorer.js";
import type { ScanledgerDb } from "../storage/db.js";
import type { ToolSettings } from "../tools/runCommand.js";
import type { Analysis, Project, ProjectLinesCount } from "../types.js";
import { assertValidArchive, extractArchive, sha256File } from "./archive.js";

export interface ProjectContext {
  db: ScanledgerDb;
  projectsDir: string;
  scc?: ToolSettings;
  logger?: Logger;
  /** Defaults to the SCANLEDGER_CHECK_DUPLICATE_ARCHIVES flag. */
  checkDuplicates?: boolean;
}

export interface NewProjectParams {
  name: string;
  archivePath: string;
}

export interface ProjectOverview {
  project: Project;
  analysis: Analysis | null;
  linesCount: ProjectLinesCount | null;
  riskLevel: number;
  occurrences: number;
}

export function projectDir(projectsDir: string, projectId: number): string {
  return path.join(projectsDir, String(projectId));
}

export function findProjectByArchiveDigest(db: ScanledgerDb, sha256: string): Project | null {
  return db.projects.findByArchiveSha256(sha256);
}

function requireProject(db: ScanledgerDb, projectId: number): Project {
  const project = db.projects.getById(projectId);
  if (!project) throw new ProjectNotFoundError(projectId);
  return project;
}

/**
 * Validates the archive, records its digest and unpacks it under
 * `<projectsDir>/<id>/extract`. A failure after the row is inserted removes
 * both the row and the project directory.
 */
export async function createProjectFromArchive(ctx: ProjectContext, params: NewProjectParams): Promise<Project> {
  const logger = ctx.logger ?? noopLogger;
  const name = params.name.trim();
  if (!name) {
    throw new Error("A project needs a name.");
  }
  assertValidArchive(params.archivePath);
  const archiveSha256 = await sha256File(params.archivePath);

  if (ctx.checkDuplicates ?? isDuplicateArchiveCheckEnabled()) {
    const existing = findProjectByArchiveDigest(ctx.db, archiveSha256);
    if (existing) throw new ArchiveDuplicateError(archiveSha256, existing.id);
  }

  const project = ctx.db.projects.insert({ name, archiveSha256 });
  const dir = projectDir(ctx.projectsDir, project.id);
  const sourcePath = path.join(dir, EXTRACT_FOLDER_NAME);
  try {
    await mkdir(dir, { recursive: true });
    await copyFile(params.archivePath, path.join(dir, ARCHIVE_FILE_NAME));
    extractArchive(params.archivePath, sourcePath);
    ctx.db.projects.updateSourcePath(project.id, sourcePath);
  } catch (err) {
    await rm(dir, { recursive: true, force: true });
    ctx.db.projects.delete(project.id);
    throw err;
  }

  logger.info("Project created", { projectId: project.id, name, archiveSha256 });
  return { ...project, sourcePath };
}

/** Deletes the project directory, then the project and everything hanging off it. */
export async function removeProject(ctx: ProjectContext, projectId: number): Promise<void> {
  const logger = ctx.logger ?? noopLogger;
  const project = requireProject(ctx.db, projectId);
  await rm(projectDir(ctx.projectsDir, project.id), { recursive: true, force: true });
  ctx.db.projects.delete(project.id);
  logger.info("Project removed", { projectId: project.id });
}

export async function countProjectLines(ctx: ProjectContext, projectId: number): Promise<ProjectLinesCount> {
  const project = requireProject(ctx.db, projectId);
  const linesCount = await countLines({ sourcePath: project.sourcePath, scc: ctx.scc, logger: ctx.logger });
  ctx.db.linesCounts.replaceForProject(project.id, linesCount);
  return linesCount;
}

/** Creates the project and counts its lines as one job. */
export async function runProjectPipeline(
  ctx: ProjectContext,
  params: NewProjectParams
): Promise<{ project: Project; linesCount: ProjectLinesCount }> {
  const project = await createProjectFromArchive(ctx, params);
  const linesCount = await countProjectLines(ctx, project.id);
  return { project, linesCount };
}

export function getProjectOverview(db: ScanledgerDb, projectId: number): ProjectOverview {
  const project = requireProject(db, projectId);
  const analysis = db.analyses.getForProject(project.id);
  const linesCount = db.linesCounts.getForProject(project.id);
  return {
    project,
    analysis,
    linesCount,
    riskLevel: computeRiskLevel({ analysis, linesCount }),
    occurrences: countOccurrences(analysis)
  };
}
