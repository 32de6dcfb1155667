import type { ZodType } from "zod";

/*
 * Redis hashes only hold strings. These helpers turn stored fields back
 * into typed values; absent or empty fields decode to the given fallback.
 */

export function str(data: Record<string, string>, field: string): string {
  return data[field] ?? "";
}

export function int(data: Record<string, string>, field: string): number {
  return parseInt(data[field] || "0", 10);
}

export function intOrNull(data: Record<string, string>, field: string): number | null {
  const raw = data[field];
  if (!raw) return null;
  const n = parseInt(raw, 10);
  return Number.isNaN(n) ? null : n;
}

export function floatOrNull(data: Record<string, string>, field: string): number | null {
  const raw = data[field];
  if (!raw) return null;
  const n = parseFloat(raw);
  return Number.isNaN(n) ? null : n;
}

export function bool(data: Record<string, string>, field: string): boolean {
  return data[field] === "1";
}

export function strOrNull(data: Record<string, string>, field: string): string | null {
  return data[field] || null;
}

export function json<T>(data: Record<string, string>, field: string, schema: ZodType<T>, fallback: T): T {
  const raw = data[field];
  if (!raw) return fallback;
  const parsed = schema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : fallback;
}

/* ── encoding ── */

export function flag(value: boolean): string {
  return value ? "1" : "0";
}

export function nullable(value: string | number | null): string {
  return value === null ? "" : String(value);
}

export function pickEnum<T extends string>(raw: string, allowed: readonly T[], fallback: T): T {
  const found = allowed.find((v) => v === raw);
  return found ?? fallback;
}
