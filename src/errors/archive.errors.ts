export type ArchiveRejectionReason = "invalid zip file" | "encrypted zip file";

export class ArchiveInvalidError extends Error {
  reason: ArchiveRejectionReason;

  constructor(archivePath: string, reason: ArchiveRejectionReason) {
    super(`Archive rejected (${reason}): ${archivePath}`);
    this.name = "ArchiveInvalidError";
    this.reason = reason;
  }
}

export class ArchiveDuplicateError extends Error {
  existingProjectId: number;

  constructor(sha256: string, existingProjectId: number) {
    super(`Archive ${sha256} was already uploaded as project #${existingProjectId}.`);
    this.name = "ArchiveDuplicateError";
    this.existingProjectId = existingProjectId;
  }
}
