import { Role, type User } from "../types/domain/access.js";
import type { MembershipLookup } from "../repositories/teamRepository.js";
import type { Project } from "../types.js";

/** Ids of the projects reachable through any of the user's teams, each listed once, ascending. */
export function listAccessibleProjectIds(membership: MembershipLookup, user: Pick<User, "id">): number[] {
  const teamIds = membership.listTeamIdsForUser(user.id);
  const unique = new Set(membership.listProjectIdsForTeams(teamIds));
  return [...unique].sort((a, b) => a - b);
}

/** Admins see every project; other users need at least one team shared with the project. */
export function hasAccess(
  membership: MembershipLookup,
  user: Pick<User, "id" | "role">,
  project: Pick<Project, "id">
): boolean {
  if (user.role === Role.Admin) return true;
  const userTeams = new Set(membership.listTeamIdsForUser(user.id));
  return membership.listTeamIdsForProject(project.id).some((teamId) => userTeams.has(teamId));
}
