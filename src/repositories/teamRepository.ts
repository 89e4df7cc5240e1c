import type Database from "better-sqlite3";
import type { Team } from "../types.js";
import { placeholders } from "./rowMapping.js";

/** Team membership lookups the access checks need. */
export interface MembershipLookup {
  listTeamIdsForUser(userId: number): number[];
  listTeamIdsForProject(projectId: number): number[];
  /** Project ids of every given team; a project shared by several teams appears once per team. */
  listProjectIdsForTeams(teamIds: number[]): number[];
}

export class TeamRepository implements MembershipLookup {
  constructor(private db: Database.Database) {}

  create(name: string): Team {
    const result = this.db.prepare("INSERT INTO teams (name) VALUES (?)").run(name);
    return { id: Number(result.lastInsertRowid), name };
  }

  getByName(name: string): Team | null {
    const row = this.db.prepare("SELECT id, name FROM teams WHERE name = ?").get(name) as Team | undefined;
    return row ?? null;
  }

  list(): Team[] {
    return this.db.prepare("SELECT id, name FROM teams ORDER BY name").all() as Team[];
  }

  addMember(teamId: number, userId: number) {
    this.db.prepare("INSERT OR IGNORE INTO team_members (team_id, user_id) VALUES (?, ?)").run(teamId, userId);
  }

  removeMember(teamId: number, userId: number) {
    this.db.prepare("DELETE FROM team_members WHERE team_id = ? AND user_id = ?").run(teamId, userId);
  }

  addProject(teamId: number, projectId: number) {
    this.db
      .prepare("INSERT OR IGNORE INTO team_projects (team_id, project_id) VALUES (?, ?)")
      .run(teamId, projectId);
  }

  listTeamIdsForUser(userId: number): number[] {
    const rows = this.db
      .prepare("SELECT team_id as teamId FROM team_members WHERE user_id = ? ORDER BY team_id")
      .all(userId) as Array<{ teamId: number }>;
    return rows.map((row) => row.teamId);
  }

  listTeamIdsForProject(projectId: number): number[] {
    const rows = this.db
      .prepare("SELECT team_id as teamId FROM team_projects WHERE project_id = ? ORDER BY team_id")
      .all(projectId) as Array<{ teamId: number }>;
    return rows.map((row) => row.teamId);
  }

  listProjectIdsForTeams(teamIds: number[]): number[] {
    if (!teamIds.length) return [];
    const rows = this.db
      .prepare(
        `SELECT project_id as projectId FROM team_projects WHERE team_id IN (${placeholders(teamIds.length)}) ORDER BY team_id, project_id`
      )
      .all(...teamIds) as Array<{ projectId: number }>;
    return rows.map((row) => row.projectId);
  }
}
