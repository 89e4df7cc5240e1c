export function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function readEnvRaw(name: string): string | undefined {
  return process.env[name];
}

export function readFirstEnv(names: string[]): string | null {
  for (const name of names) {
    const value = readEnv(name);
    if (value) return value;
  }
  return null;
}

export function readEnvNumber(name: string): number | null {
  const raw = readEnv(name);
  if (!raw) return null;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : null;
}

export function readEnvList(name: string): string[] | null {
  const raw = readEnv(name);
  if (!raw) return null;
  const values = raw.split(",").map((value) => value.trim()).filter(Boolean);
  return values.length ? values : null;
}
