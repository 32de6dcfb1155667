import type Redis from "ioredis";
import { K } from "./keys.js";

/**
 * Split a comma-separated list into trimmed, non-empty tokens.
 */
export function splitCsv(text: string | null | undefined): string[] {
  if (!text) return [];
  return text
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);
}

/**
 * Like splitCsv, but drops case-insensitive repeats, keeping the first spelling.
 */
export function parseSkillsCsv(text: string | null | undefined): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const part of splitCsv(text)) {
    const key = part.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(part);
  }
  return out;
}

export function lowerSet(names: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const n of names) set.add(n.toLowerCase());
  return set;
}

/**
 * Resolve names against the skill registry, registering unseen ones.
 * The first spelling ever stored for a name wins.
 */
export async function getOrCreateSkills(r: Redis, names: string[]): Promise<string[]> {
  const out: string[] = [];
  for (const name of names) {
    await r.setnx(K.skill(name), name);
    out.push((await r.get(K.skill(name))) ?? name);
  }
  return out;
}
