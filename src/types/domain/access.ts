export const Role = {
  User: "user",
  Admin: "admin"
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export function parseRole(raw: unknown): Role | null {
  if (typeof raw !== "string") return null;
  const normalized = raw.trim().toLowerCase();
  if (normalized === Role.User) return Role.User;
  if (normalized === Role.Admin) return Role.Admin;
  return null;
}

export interface User {
  id: number;
  username: string;
  role: Role;
}

export interface Team {
  id: number;
  name: string;
}
