import type Redis from "ioredis";
import { json } from "./http.js";
import type { Context, Handler, Method, RouteConfig } from "./http.js";

export interface RouteModule {
  default: Handler;
  config: RouteConfig;
}

interface CompiledRoute {
  path: string;
  pattern: RegExp;
  keys: string[];
  methods: Method[];
  handler: Handler;
}

function compile(mod: RouteModule): CompiledRoute {
  const keys: string[] = [];
  const source = mod.config.path
    .split("/")
    .map((segment) => {
      if (segment.startsWith(":")) {
        keys.push(segment.slice(1));
        return "([^/]+)";
      }
      return segment.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    })
    .join("/");
  return {
    path: mod.config.path,
    pattern: new RegExp(`^${source}/?$`),
    keys,
    methods: mod.config.method,
    handler: mod.default,
  };
}

function isMethod(value: string): value is Method {
  return value === "GET" || value === "POST" || value === "PUT" || value === "DELETE";
}

/** Null when a segment holds a malformed escape such as %E0 */
function decodeParams(keys: string[], m: RegExpExecArray): Record<string, string> | null {
  const params: Record<string, string> = {};
  try {
    keys.forEach((key, i) => {
      params[key] = decodeURIComponent(m[i + 1]);
    });
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
  return params;
}

export interface RouterOptions {
  redis: () => Redis;
  corsOrigin?: string;
}

/**
 * Build a fetch handler over the given route modules. Literal segments win
 * over parameters, so /api/jobs/mine is never read as a job id.
 */
export function createRouter(modules: RouteModule[], opts: RouterOptions): (req: Request) => Promise<Response> {
  const routes = modules.map(compile).sort((a, b) => a.keys.length - b.keys.length);
  const cors = {
    "Access-Control-Allow-Origin": opts.corsOrigin ?? "*",
    "Access-Control-Allow-Methods": "GET, POST, PUT, DELETE, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type, x-user-id, x-webhook-secret",
  };

  const withCors = (res: Response): Response => {
    for (const [k, v] of Object.entries(cors)) res.headers.set(k, v);
    return res;
  };

  return async (req) => {
    if (req.method === "OPTIONS") return new Response(null, { status: 204, headers: cors });

    const { pathname } = new URL(req.url);
    let pathMatched = false;

    for (const route of routes) {
      const m = route.pattern.exec(pathname);
      if (!m) continue;
      pathMatched = true;
      if (!isMethod(req.method) || !route.methods.includes(req.method)) continue;

      const params = decodeParams(route.keys, m);
      if (!params) return withCors(json({ error: "Not found" }, 404));
      const ctx: Context = { params, redis: opts.redis() };
      return withCors(await route.handler(req, ctx));
    }

    return withCors(
      pathMatched ? json({ error: "Method not allowed" }, 405) : json({ error: `No route for ${pathname}` }, 404),
    );
  };
}
