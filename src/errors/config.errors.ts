export class ConfigInvalidError extends Error {
  constructor(configPath: string, message: string) {
    super(`Invalid configuration in ${configPath}: ${message}`);
    this.name = "ConfigInvalidError";
  }
}
