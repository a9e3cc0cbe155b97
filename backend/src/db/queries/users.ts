import { db } from './shared.js';

export interface User {
  id: number;
  email: string;
  username: string;
  displayName: string;
  createdAt: Date;
}

interface UserRow {
  id: number;
  email: string;
  username: string;
  display_name: string;
  created_at: Date;
}

export function userRowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    displayName: row.display_name,
    createdAt: row.created_at
  };
}

export async function createUser(email: string, username: string, displayName: string): Promise<User> {
  const result = await db.query<UserRow>(
    `INSERT INTO users (email, username, display_name)
     VALUES ($1, $2, $3)
     RETURNING *`,
    [email, username, displayName]
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error('Failed to create user');
  }
  return userRowToUser(row);
}

export async function findUserById(id: number): Promise<User | undefined> {
  const result = await db.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
  return result.rows[0] ? userRowToUser(result.rows[0]) : undefined;
}
