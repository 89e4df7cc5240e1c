#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import pc from "picocolors";
import { loadConfig, type ScanledgerConfig } from "./config/loadConfig.js";
import { UserNotFoundError, TeamNotFoundError, ProjectNotFoundError } from "./errors/storage.errors.js";
import { combineLoggers, createAppLogger, noopLogger, type AppLogger, type Logger } from "./logging/logger.js";
import { listAccessibleProjectIds, hasAccess } from "./access/accessResolver.js";
import { seedSupportedLanguages } from "./languages/supportedLanguages.js";
import { importFindings } from "./projects/findingsImport.js";
import {
  countProjectLines,
  createProjectFromArchive,
  getProjectOverview,
  removeProject,
  runProjectPipeline,
  type ProjectContext
} from "./projects/projectService.js";
import {
  formatJson,
  formatLanguages,
  formatLinesCount,
  formatProjectList,
  formatProjectOverview,
  formatRuleList,
  formatRuleRepositories,
  formatRuleSyncSummary
} from "./report/formatters.js";
import {
  addRuleRepository,
  refreshRuleRepository,
  removeRuleRepository,
  type RuleRepositoryContext
} from "./rules/ruleRepositoryService.js";
import { syncAllRules, syncRules } from "./rules/syncRules.js";
import { ScanledgerDb } from "./storage/db.js";
import { parseRole } from "./types/domain/access.js";
import { parseSeverityTier } from "./types/domain/severity.js";
import type { RuleSyncSummary, SeverityTier } from "./types.js";

const program = new Command();

type GlobalOptions = { root?: string; config?: string; json?: boolean; debug?: boolean };

class Spinner {
  private frames = ["-", "\\", "|", "/"];
  private frameIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private text = "";

  constructor(private stream: { isTTY?: boolean; write: (chunk: string) => void }) {}

  start(text: string) {
    this.text = text;
    if (!this.stream.isTTY) return;
    if (this.timer) return;
    this.render();
    this.timer = setInterval(() => this.render(), 120);
  }

  update(text: string) {
    this.text = text;
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.clear();
  }

  private render() {
    if (!this.stream.isTTY) return;
    const frame = this.frames[this.frameIndex % this.frames.length];
    this.frameIndex += 1;
    this.stream.write(`\r\x1b[2K${frame} ${this.text}`);
  }

  private clear() {
    if (!this.stream.isTTY) return;
    this.stream.write("\r\x1b[2K");
  }
}

interface Session {
  config: ScanledgerConfig;
  db: ScanledgerDb;
  logger: Logger;
  spinner: Spinner | null;
  json: boolean;
}

function parseId(raw: string, label: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${label}: ${raw}`);
  }
  return value;
}

function projectContext(session: Session): ProjectContext {
  return {
    db: session.db,
    projectsDir: session.config.projectsDir,
    scc: session.config.tools.scc,
    logger: session.logger
  };
}

function ruleContext(session: Session): RuleRepositoryContext {
  return {
    db: session.db,
    rulesRoot: session.config.rulesDir,
    git: session.config.tools.git,
    extensions: session.config.rules.extensions,
    exclude: session.config.rules.exclude,
    logger: session.logger
  };
}

/** Loads config, opens the log file and database, runs `task`, and reports failures as `Error: ...`. */
async function withSession(label: string, task: (session: Session) => Promise<void>): Promise<void> {
  const options = program.opts<GlobalOptions>();
  const json = Boolean(options.json);
  const spinner = !json && process.stderr.isTTY ? new Spinner(process.stderr) : null;
  let appLogger: AppLogger | null = null;
  let db: ScanledgerDb | null = null;
  try {
    const config = await loadConfig({
      projectRoot: path.resolve(process.cwd(), options.root ?? "."),
      configPath: options.config
    });
    try {
      appLogger = await createAppLogger({
        stateDir: config.stateDir,
        label,
        level: options.debug ? "debug" : config.logging.level
      });
    } catch {
      appLogger = null;
    }
    const appLog = appLogger ?? noopLogger;
    const consoleLogger: Logger = {
      debug: () => {},
      info: (message) => spinner?.update(message),
      warn: (message) => {
        if (!json) console.error(pc.yellow(message));
      },
      error: () => {}
    };
    const logger = combineLoggers(appLog, consoleLogger);
    db = new ScanledgerDb({ filename: config.databasePath, logger: (message) => appLog.info(message) });
    await task({ config, db, logger, spinner, json });
  } catch (err) {
    spinner?.stop();
    const message = err instanceof Error ? err.message : String(err);
    appLogger?.error("Command failed", { error: message });
    console.error(pc.red(`Error: ${message}`));
    process.exitCode = 1;
  } finally {
    spinner?.stop();
    db?.close();
    await appLogger?.close();
  }
}

function print(session: Session, value: unknown, text: string) {
  console.log(session.json ? formatJson(value) : text);
}

program
  .name("scanledger")
  .description("Static-analysis project manager: projects, line counts, rule catalog and team access")
  .version("0.1.0")
  .option("-r, --root <dir>", "Workspace root holding the config and state directory")
  .option("-c, --config <path>", "Path to scanledger.config.json")
  .option("--json", "Print JSON instead of text")
  .option("--debug", "Write debug records to the log file");

const project = program.command("project").description("Manage uploaded projects");

project
  .command("add <name> <archive>")
  .description("Create a project from a zip archive and count its lines")
  .option("--no-count", "Skip line counting")
  .action(async (name: string, archive: string, options: { count: boolean }) => {
    await withSession("project-add", async (session) => {
      const ctx = projectContext(session);
      const archivePath = path.resolve(process.cwd(), archive);
      session.spinner?.start(`Creating project ${name}...`);
      if (!options.count) {
        const created = await createProjectFromArchive(ctx, { name, archivePath });
        session.spinner?.stop();
        print(session, created, pc.green(`Created project #${created.id} ${created.name}.`));
        return;
      }
      const result = await runProjectPipeline(ctx, { name, archivePath });
      session.spinner?.stop();
      print(
        session,
        result,
        `${pc.green(`Created project #${result.project.id} ${result.project.name}.`)}\n${formatLinesCount(result.linesCount)}`
      );
    });
  });

project
  .command("remove <id>")
  .description("Delete a project, its files and its results")
  .action(async (id: string) => {
    await withSession("project-remove", async (session) => {
      const projectId = parseId(id, "project id");
      await removeProject(projectContext(session), projectId);
      print(session, { removed: projectId }, `Removed project #${projectId}.`);
    });
  });

project
  .command("list")
  .description("List projects")
  .action(async () => {
    await withSession("project-list", async (session) => {
      const projects = session.db.projects.list();
      print(session, projects, formatProjectList(projects));
    });
  });

project
  .command("show <id>")
  .description("Show a project's risk level, line counts and findings")
  .action(async (id: string) => {
    await withSession("project-show", async (session) => {
      const overview = getProjectOverview(session.db, parseId(id, "project id"));
      print(session, overview, formatProjectOverview(overview));
    });
  });

project
  .command("count-lines <id>")
  .description("Run scc on the project sources and store the counts")
  .action(async (id: string) => {
    await withSession("project-count-lines", async (session) => {
      session.spinner?.start("Counting lines...");
      const linesCount = await countProjectLines(projectContext(session), parseId(id, "project id"));
      session.spinner?.stop();
      print(session, linesCount, formatLinesCount(linesCount, linesCount.languages.length));
    });
  });

project
  .command("import-findings <id> <file>")
  .description("Replace the project's analysis with a findings JSON document")
  .action(async (id: string, file: string) => {
    await withSession("project-import-findings", async (session) => {
      const analysis = await importFindings({
        db: session.db,
        projectId: parseId(id, "project id"),
        findingsPath: path.resolve(process.cwd(), file),
        logger: session.logger
      });
      print(
        session,
        analysis,
        `Imported ${analysis.vulnerabilities.length} vulnerabilities and ${analysis.vulnerableDependencies.length} vulnerable dependencies.`
      );
    });
  });

const rules = program.command("rules").description("Manage rule repositories and the rule catalog");

rules
  .command("repo-add <name> <uri>")
  .description("Register a git repository of rule files")
  .action(async (name: string, uri: string) => {
    await withSession("rules-repo-add", async (session) => {
      const repository = addRuleRepository(session.db, { name, uri });
      print(session, repository, `Registered rule repository ${repository.name}.`);
    });
  });

rules
  .command("repo-remove <name>")
  .description("Delete a rule repository, its checkout and its rules")
  .action(async (name: string) => {
    await withSession("rules-repo-remove", async (session) => {
      await removeRuleRepository(ruleContext(session), name);
      print(session, { removed: name }, `Removed rule repository ${name}.`);
    });
  });

rules
  .command("repo-list")
  .description("List rule repositories")
  .action(async () => {
    await withSession("rules-repo-list", async (session) => {
      const repositories = session.db.ruleRepositories.list();
      print(session, repositories, formatRuleRepositories(repositories));
    });
  });

rules
  .command("sync [name]")
  .description("Synchronize the rule catalog from checkouts (all repositories when no name is given)")
  .option("--fetch", "Clone or pull the repository before syncing")
  .action(async (name: string | undefined, options: { fetch?: boolean }) => {
    await withSession("rules-sync", async (session) => {
      const ctx = ruleContext(session);
      session.spinner?.start("Synchronizing rules...");
      let summaries: RuleSyncSummary[];
      if (name && options.fetch) {
        summaries = [await refreshRuleRepository(ctx, name)];
      } else if (name) {
        summaries = [
          await syncRules({
            db: ctx.db,
            rulesRoot: ctx.rulesRoot,
            repositoryName: name,
            extensions: ctx.extensions,
            exclude: ctx.exclude,
            logger: ctx.logger
          })
        ];
      } else {
        if (options.fetch) {
          for (const repository of session.db.ruleRepositories.list()) {
            await refreshRuleRepository(ctx, repository.name);
          }
        }
        summaries = await syncAllRules({
          db: ctx.db,
          rulesRoot: ctx.rulesRoot,
          extensions: ctx.extensions,
          exclude: ctx.exclude,
          logger: ctx.logger
        });
      }
      session.spinner?.stop();
      print(session, summaries, summaries.map(formatRuleSyncSummary).join("\n") || "No rule repositories synced.");
    });
  });

rules
  .command("list")
  .description("List rules in the catalog")
  .option("--repo <name>", "Only rules of this repository")
  .option("--severity <tier>", "Only rules of this severity (low|medium|high|critical)")
  .option("--language <name>", "Only rules for this language")
  .action(async (options: { repo?: string; severity?: string; language?: string }) => {
    await withSession("rules-list", async (session) => {
      let repositoryId: number | undefined;
      if (options.repo) {
        const repository = session.db.ruleRepositories.getByName(options.repo);
        if (!repository) throw new Error(`Unknown rule repository: ${options.repo}`);
        repositoryId = repository.id;
      }
      let severity: SeverityTier | undefined;
      if (options.severity) {
        severity = parseSeverityTier(options.severity) ?? undefined;
        if (!severity) throw new Error(`Unknown severity: ${options.severity}`);
      }
      const found = session.db.rules.list({ repositoryId, severity, language: options.language });
      print(session, found, formatRuleList(found));
    });
  });

const languages = program.command("languages").description("Manage supported languages");

languages
  .command("add [names...]")
  .description("Add supported languages (the default set when no name is given)")
  .action(async (names: string[] | undefined) => {
    await withSession("languages-add", async (session) => {
      const added = names?.length ? seedSupportedLanguages(session.db, names) : seedSupportedLanguages(session.db);
      print(session, added, `${added.length} supported languages stored.`);
    });
  });

languages
  .command("list")
  .description("List supported languages")
  .action(async () => {
    await withSession("languages-list", async (session) => {
      const list = session.db.languages.list();
      print(session, list, formatLanguages(list));
    });
  });

const team = program.command("team").description("Manage teams");

team
  .command("add <name>")
  .description("Create a team")
  .action(async (name: string) => {
    await withSession("team-add", async (session) => {
      const created = session.db.teams.create(name);
      print(session, created, `Created team ${created.name}.`);
    });
  });

team
  .command("add-member <team> <username>")
  .description("Add a user to a team")
  .action(async (teamName: string, username: string) => {
    await withSession("team-add-member", async (session) => {
      const found = session.db.teams.getByName(teamName);
      if (!found) throw new TeamNotFoundError(teamName);
      const user = session.db.users.getByUsername(username);
      if (!user) throw new UserNotFoundError(username);
      session.db.teams.addMember(found.id, user.id);
      print(session, { team: found.name, user: user.username }, `Added ${user.username} to ${found.name}.`);
    });
  });

team
  .command("add-project <team> <projectId>")
  .description("Give a team access to a project")
  .action(async (teamName: string, id: string) => {
    await withSession("team-add-project", async (session) => {
      const found = session.db.teams.getByName(teamName);
      if (!found) throw new TeamNotFoundError(teamName);
      const projectId = parseId(id, "project id");
      if (!session.db.projects.getById(projectId)) throw new ProjectNotFoundError(projectId);
      session.db.teams.addProject(found.id, projectId);
      print(session, { team: found.name, projectId }, `Project #${projectId} assigned to ${found.name}.`);
    });
  });

program
  .command("user")
  .description("Manage users")
  .command("add <username>")
  .description("Create a user")
  .option("--role <role>", "user or admin", "user")
  .action(async (username: string, options: { role: string }) => {
    await withSession("user-add", async (session) => {
      const role = parseRole(options.role);
      if (!role) throw new Error(`Unknown role: ${options.role}`);
      const user = session.db.users.create(username, role);
      print(session, user, `Created ${user.role} ${user.username}.`);
    });
  });

const access = program.command("access").description("Check project access");

access
  .command("check <username> <projectId>")
  .description("Tell whether a user may see a project")
  .action(async (username: string, id: string) => {
    await withSession("access-check", async (session) => {
      const user = session.db.users.getByUsername(username);
      if (!user) throw new UserNotFoundError(username);
      const projectId = parseId(id, "project id");
      const found = session.db.projects.getById(projectId);
      if (!found) throw new ProjectNotFoundError(projectId);
      const allowed = hasAccess(session.db.teams, user, found);
      print(
        session,
        { username: user.username, projectId, allowed },
        allowed ? pc.green(`${user.username} can access project #${projectId}.`) : pc.red(`${user.username} cannot access project #${projectId}.`)
      );
    });
  });

access
  .command("list <username>")
  .description("List the projects a user reaches through team membership")
  .action(async (username: string) => {
    await withSession("access-list", async (session) => {
      const user = session.db.users.getByUsername(username);
      if (!user) throw new UserNotFoundError(username);
      const projects = session.db.projects.getByIds(listAccessibleProjectIds(session.db.teams, user));
      print(session, projects, formatProjectList(projects));
    });
  });

await program.parseAsync(process.argv);
