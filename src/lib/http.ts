import type Redis from "ioredis";
import { ZodError } from "zod";
import { HttpError, badRequest, unauthorized } from "./errors.js";
import { getUser } from "./accounts.js";
import type { User } from "./types.js";

export type Method = "GET" | "POST" | "PUT" | "DELETE";

export interface RouteConfig {
  path: string;
  method: Method[];
}

export interface Context {
  params: Record<string, string>;
  redis: Redis;
}

export type Handler = (req: Request, ctx: Context) => Promise<Response>;

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data, null, 2), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Wraps a handler so that thrown errors become JSON responses.
 * HttpError keeps its status, validation failures are 400, the rest 500.
 */
export function handle(name: string, fn: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await fn(req, ctx);
    } catch (error) {
      if (error instanceof HttpError) {
        return json(error.details === undefined ? { error: error.message } : { error: error.message, details: error.details }, error.status);
      }
      if (error instanceof ZodError) {
        return json({ error: "Invalid request", details: error.issues }, 400);
      }
      console.error(`${name} error:`, error);
      return json({ error: error instanceof Error ? error.message : String(error) }, 500);
    }
  };
}

export async function readBody(req: Request): Promise<unknown> {
  const text = await req.text();
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw badRequest("Request body is not valid JSON");
  }
}

export function queryOf(req: Request): Record<string, string> {
  const url = new URL(req.url);
  return Object.fromEntries(url.searchParams.entries());
}

export function intParam(ctx: Context, name: string): number {
  const n = parseInt(ctx.params[name] ?? "", 10);
  if (Number.isNaN(n)) throw new HttpError(404, "Not found");
  return n;
}

/**
 * The acting user is asserted by the gateway in front of this service
 * through the x-user-id header.
 */
export async function optionalUser(req: Request, r: Redis): Promise<User | null> {
  const raw = req.headers.get("x-user-id");
  if (!raw) return null;
  const id = parseInt(raw, 10);
  if (Number.isNaN(id)) return null;
  return getUser(r, id);
}

export async function requireUser(req: Request, r: Redis): Promise<User> {
  const user = await optionalUser(req, r);
  if (!user) throw unauthorized();
  return user;
}
