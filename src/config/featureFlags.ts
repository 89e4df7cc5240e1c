import { readEnvRaw } from "./env.js";

export const CHECK_DUPLICATE_ARCHIVES_FLAG = "SCANLEDGER_CHECK_DUPLICATE_ARCHIVES";

const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);
const FALSY = new Set(["0", "false", "no", "n", "off"]);

/** Rejecting an archive already uploaded under another project is on unless disabled. */
export function isDuplicateArchiveCheckEnabled(): boolean {
  const raw = readEnvRaw(CHECK_DUPLICATE_ARCHIVES_FLAG);
  if (raw == null) return true;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return true;
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return true;
}
