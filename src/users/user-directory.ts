import { readFileSync } from "node:fs";
import { z } from "zod";

export const directoryUserSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  email: z.string().email(),
  /** Forwarded to the analytics platform as the row-level-security value. */
  department: z.string().min(1),
});

export type DirectoryUser = z.infer<typeof directoryUserSchema>;

/** Profile shape returned to the frontend. */
export interface UserProfile {
  id: string;
  name: string;
  email: string;
  department: string;
}

export const userDirectoryFileSchema = z
  .record(z.string().min(1), directoryUserSchema)
  .refine((users) => Object.keys(users).length > 0, { message: "user directory must define at least one user" });

export interface IUserDirectory {
  findByUsername(username: string): DirectoryUser | null;
  usernames(): string[];
}

/** Built-in demo users. Departments drive per-user filtering in the embedded dashboard. */
export const DEMO_USERS: Readonly<Record<string, DirectoryUser>> = {
  alice: {
    id: "user_alice",
    name: "Alice Johnson",
    email: "alice@example.com",
    department: "Sales",
  },
  bob: {
    id: "user_bob",
    name: "Bob Smith",
    email: "bob@example.com",
    department: "Engineering",
  },
};

/**
 * Read-only username → user lookup. Entries are copied on construction and on
 * every lookup, so callers can never mutate the directory.
 */
export class StaticUserDirectory implements IUserDirectory {
  private readonly users: ReadonlyMap<string, DirectoryUser>;

  constructor(entries: Readonly<Record<string, DirectoryUser>>) {
    this.users = new Map(Object.entries(entries).map(([username, user]) => [username, { ...user }] as const));
  }

  findByUsername(username: string): DirectoryUser | null {
    const user = this.users.get(username);
    return user ? { ...user } : null;
  }

  usernames(): string[] {
    return [...this.users.keys()];
  }
}

/**
 * Load the user directory. Without a path the built-in demo users are used;
 * with one, the JSON file must map usernames to user objects.
 */
export function loadUserDirectory(path?: string): IUserDirectory {
  if (!path) return new StaticUserDirectory(DEMO_USERS);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(`Failed to read user directory ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = userDirectoryFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid user directory ${path}:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
  }
  return new StaticUserDirectory(parsed.data);
}

export function toUserProfile(user: DirectoryUser): UserProfile {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    department: user.department,
  };
}
