export class RuleFileParseError extends Error {
  filePath: string;

  constructor(filePath: string, message: string) {
    super(`Rule file ${filePath} could not be parsed: ${message}`);
    this.name = "RuleFileParseError";
    this.filePath = filePath;
  }
}

export class RuleRepositoryNotFoundError extends Error {
  constructor(name: string) {
    super(`Unknown rule repository: ${name}`);
    this.name = "RuleRepositoryNotFoundError";
  }
}

export class RuleRepositoryExistsError extends Error {
  constructor(name: string) {
    super(`Rule repository already exists: ${name}`);
    this.name = "RuleRepositoryExistsError";
  }
}
