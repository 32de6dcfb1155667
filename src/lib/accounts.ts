import type Redis from "ioredis";
import { K, nextId } from "./keys.js";
import { bool, flag, int, pickEnum, str } from "./fields.js";
import { conflict, notFound } from "./errors.js";
import { getOrCreateProfile } from "./profiles.js";
import { ACCOUNT_TYPES } from "./types.js";
import type { User } from "./types.js";
import type { CreateUserInput } from "./validation.js";

function toUser(data: Record<string, string>): User | null {
  if (!data.id) return null;
  return {
    id: int(data, "id"),
    username: str(data, "username"),
    email: str(data, "email"),
    firstName: str(data, "first_name"),
    lastName: str(data, "last_name"),
    accountType: pickEnum(str(data, "account_type"), ACCOUNT_TYPES, "JOB_SEEKER"),
    isStaff: bool(data, "is_staff"),
    dateJoined: str(data, "date_joined"),
  };
}

export const isJobSeeker = (user: User): boolean => user.accountType === "JOB_SEEKER";
export const isRecruiter = (user: User): boolean => user.accountType === "RECRUITER";

/** Recruiter-only areas answer 404 to everyone else */
export function requireRecruiter(user: User): void {
  if (!isRecruiter(user)) throw notFound("Page not found");
}

export function displayName(user: User): string {
  const full = `${user.firstName} ${user.lastName}`.trim();
  return full || user.username;
}

export async function createUser(
  r: Redis,
  input: CreateUserInput,
  opts: { isStaff?: boolean } = {},
): Promise<User> {
  const id = await nextId(r, "user");
  // Claim the username before writing anything else
  const claimed = await r.set(K.username(input.username), String(id), "NX");
  if (claimed !== "OK") throw conflict(`Username "${input.username}" is already taken`);

  const user: User = {
    id,
    username: input.username,
    email: input.email,
    firstName: input.firstName,
    lastName: input.lastName,
    accountType: input.accountType,
    isStaff: opts.isStaff ?? false,
    dateJoined: new Date().toISOString(),
  };

  const pipe = r.pipeline();
  pipe.hset(K.user(id), {
    id: String(id),
    username: user.username,
    email: user.email,
    first_name: user.firstName,
    last_name: user.lastName,
    account_type: user.accountType,
    is_staff: flag(user.isStaff),
    date_joined: user.dateJoined,
  });
  pipe.sadd(K.usersIdx(), String(id));
  await pipe.exec();

  if (isJobSeeker(user)) {
    await getOrCreateProfile(r, id);
  }

  return user;
}

export async function getUser(r: Redis, id: number): Promise<User | null> {
  return toUser(await r.hgetall(K.user(id)));
}

export async function requireExistingUser(r: Redis, id: number): Promise<User> {
  const user = await getUser(r, id);
  if (!user) throw notFound("User not found");
  return user;
}

export async function getUserByUsername(r: Redis, username: string): Promise<User | null> {
  const id = await r.get(K.username(username));
  if (!id) return null;
  return getUser(r, parseInt(id, 10));
}

export async function getUsers(r: Redis, ids: number[]): Promise<Map<number, User>> {
  const users = await Promise.all(ids.map((id) => getUser(r, id)));
  const byId = new Map<number, User>();
  for (const u of users) {
    if (u) byId.set(u.id, u);
  }
  return byId;
}

export async function listUsers(r: Redis): Promise<User[]> {
  const ids = await r.smembers(K.usersIdx());
  const users = await getUsers(r, ids.map((id) => parseInt(id, 10)));
  return [...users.values()].sort((a, b) => a.id - b.id);
}

/**
 * Where a freshly identified user should land.
 */
export function homePath(user: User): string {
  return isRecruiter(user) ? "/api/jobs/mine" : "/api/profiles/me";
}
