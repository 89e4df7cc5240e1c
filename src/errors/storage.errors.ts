export class ProjectNotFoundError extends Error {
  constructor(projectId: number) {
    super(`Project #${projectId} not found.`);
    this.name = "ProjectNotFoundError";
  }
}

export class UserNotFoundError extends Error {
  constructor(username: string) {
    super(`User not found: ${username}`);
    this.name = "UserNotFoundError";
  }
}

export class TeamNotFoundError extends Error {
  constructor(name: string) {
    super(`Team not found: ${name}`);
    this.name = "TeamNotFoundError";
  }
}
