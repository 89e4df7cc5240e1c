import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import AdmZip from "adm-zip";
import { ArchiveInvalidError, type ArchiveRejectionReason } from "../errors/archive.errors.js";

export type ArchiveCheck = { valid: true } | { valid: false; reason: ArchiveRejectionReason };

const ENCRYPTED_FLAG = 0x1;
const DIGEST_BLOCK_SIZE = 4096;

function openZip(archivePath: string): AdmZip | null {
  try {
    return new AdmZip(archivePath);
  } catch {
    return null;
  }
}

/** Rejects anything that is not a readable zip, and zips holding an encrypted entry. */
export function checkArchive(archivePath: string): ArchiveCheck {
  const zip = openZip(archivePath);
  if (!zip) return { valid: false, reason: "invalid zip file" };
  const encrypted = zip.getEntries().some((entry) => (entry.header.flags & ENCRYPTED_FLAG) !== 0);
  if (encrypted) return { valid: false, reason: "encrypted zip file" };
  return { valid: true };
}

export function assertValidArchive(archivePath: string) {
  const check = checkArchive(archivePath);
  if (!check.valid) {
    throw new ArchiveInvalidError(archivePath, check.reason);
  }
}

export function sha256File(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    const stream = createReadStream(filePath, { highWaterMark: DIGEST_BLOCK_SIZE });
    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("error", reject);
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}

export function extractArchive(archivePath: string, destination: string) {
  const zip = openZip(archivePath);
  if (!zip) {
    throw new ArchiveInvalidError(archivePath, "invalid zip file");
  }
  zip.extractAllTo(destination, true);
}
