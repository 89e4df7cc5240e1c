import type Database from "better-sqlite3";
import { parseRole, type Role, type User } from "../types/domain/access.js";

type UserRow = { id: number; username: string; role: string };

function toUser(row: UserRow): User {
  const role = parseRole(row.role);
  if (!role) {
    throw new Error(`Stored role "${row.role}" of user ${row.username} is not a known role.`);
  }
  return { id: row.id, username: row.username, role };
}

export class UserRepository {
  constructor(private db: Database.Database) {}

  create(username: string, role: Role): User {
    const result = this.db.prepare("INSERT INTO users (username, role) VALUES (?, ?)").run(username, role);
    return { id: Number(result.lastInsertRowid), username, role };
  }

  getByUsername(username: string): User | null {
    const row = this.db
      .prepare("SELECT id, username, role FROM users WHERE username = ?")
      .get(username) as UserRow | undefined;
    return row ? toUser(row) : null;
  }
}
