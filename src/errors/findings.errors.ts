export class FindingsImportError extends Error {
  constructor(message: string) {
    super(`Findings document invalid: ${message}`);
    this.name = "FindingsImportError";
  }
}
