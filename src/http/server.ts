import http from "node:http";
import { randomUUID } from "node:crypto";

import { ConfigurationError, type ScoreOptions } from "../core/index.js";
import { logger } from "../logging/logger.js";
import { catalogSchema, type CatalogEntry } from "./catalog.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { asInt, asString, isRecord, parseIntParam, pushErr } from "./validation.js";
import type { Engine, FilterQuery } from "./engine.js";

const SERVICE = "fuzzy_engine";
const VERSION = "0.1.0";
const MAX_QUERY_LENGTH = 1024;
const MAX_RESULTS_LIMIT = 1000;
const MAX_INLINE_CANDIDATES = 10_000;
const WEIGHT_KEYS = [
  "adjacencyBonus",
  "camelBonus",
  "separatorBonus",
  "leadingLetterPenalty",
  "maxLeadingLetterPenalty",
  "unmatchedLetterPenalty",
] as const;

const log = logger.child("http");

export interface ServerOptions {
  port?: number;
  engine: Engine;
  /** Used when a request does not say how many results it wants. */
  maxResults?: number;
}

export interface RequestContext {
  method: string;
  url: URL;
  requestId: string;
  /** Parsed JSON body; undefined when the request has none. */
  body?: unknown;
  contentType?: string;
  signal?: AbortSignal;
}

export interface Reply {
  status: number;
  contentType: string;
  body: unknown;
}

const json = (status: number, body: unknown): Reply => ({ status, contentType: "application/json", body });
const fail = (p: Problem): Reply => ({ status: p.status, contentType: PROBLEM_CONTENT_TYPE, body: p });

/** Validates a filter request. Field paths follow the JSON body; query-string requests map onto it. */
export function parseFilterRequest(
  body: unknown,
  defaultMax: number,
): { ok: true; value: Omit<FilterQuery, "signal"> } | { ok: false; errors: FieldError[] } {
  const errors: FieldError[] = [];
  if (!isRecord(body)) return { ok: false, errors: [{ path: "$", message: "must be an object" }] };

  const query = body.query === undefined ? "" : asString(body.query);
  if (query === undefined) pushErr(errors, "$.query", "must be a string");
  else if (query.length > MAX_QUERY_LENGTH) pushErr(errors, "$.query", "too long");

  let maxResults = defaultMax;
  if (body.maxResults !== undefined) {
    const n = asInt(body.maxResults);
    if (n === undefined || n < 0 || n > MAX_RESULTS_LIMIT) {
      pushErr(errors, "$.maxResults", `must be an integer between 0 and ${MAX_RESULTS_LIMIT}`);
    } else {
      maxResults = n;
    }
  }

  let candidates: CatalogEntry[] | undefined;
  if (body.candidates !== undefined) {
    if (!Array.isArray(body.candidates)) {
      pushErr(errors, "$.candidates", "must be an array");
    } else if (body.candidates.length > MAX_INLINE_CANDIDATES) {
      pushErr(errors, "$.candidates", `must contain at most ${MAX_INLINE_CANDIDATES} items`);
    } else {
      const parsed = catalogSchema.safeParse(body.candidates);
      if (parsed.success) {
        candidates = parsed.data;
      } else {
        for (const issue of parsed.error.issues) pushErr(errors, `$.candidates${jsonPath(issue.path)}`, issue.message);
      }
    }
  }

  let scoring: ScoreOptions | undefined;
  if (body.scoring !== undefined) {
    if (!isRecord(body.scoring)) {
      pushErr(errors, "$.scoring", "must be an object");
    } else {
      const weights: { -readonly [K in (typeof WEIGHT_KEYS)[number]]?: number } = {};
      for (const [key, value] of Object.entries(body.scoring)) {
        const known = WEIGHT_KEYS.find((k) => k === key);
        if (!known) pushErr(errors, `$.scoring.${key}`, "unknown weight");
        else if (typeof value !== "number" || !Number.isFinite(value)) pushErr(errors, `$.scoring.${key}`, "must be a finite number");
        else weights[known] = value;
      }
      scoring = weights;
    }
  }

  if (errors.length || query === undefined) return { ok: false, errors };
  return { ok: true, value: { query, maxResults, candidates, scoring } };
}

/** Routes one request. Pure apart from the engine call, so it runs without a socket. */
export async function dispatch(engine: Engine, ctx: RequestContext, opts: { started: number; defaultMax: number }): Promise<Reply> {
  const { method, url, requestId } = ctx;
  const instance = url.pathname;

  if (url.pathname === "/health") {
    if (method !== "GET") return fail(problem({ status: 405, code: "METHOD_NOT_ALLOWED", detail: "use GET", instance, requestId }));
    return json(200, {
      status: "ok",
      service: SERVICE,
      version: VERSION,
      uptimeMs: Date.now() - opts.started,
      items: engine.size,
    });
  }

  if (url.pathname !== "/filter") {
    return fail(problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance, requestId }));
  }

  let body: unknown;
  if (method === "GET") {
    const max = url.searchParams.get("max");
    const parsedMax = parseIntParam(max);
    body = {
      query: url.searchParams.get("q") ?? "",
      ...(max !== null ? { maxResults: parsedMax ?? max } : {}),
    };
  } else if (method === "POST") {
    if (!isJson(ctx.contentType)) {
      return fail(problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance, requestId }));
    }
    body = ctx.body;
  } else {
    return fail(problem({ status: 405, code: "METHOD_NOT_ALLOWED", detail: "use GET or POST", instance, requestId }));
  }

  const parsed = parseFilterRequest(body, opts.defaultMax);
  if (!parsed.ok) {
    return fail(problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors: parsed.errors }));
  }

  const started = performance.now();
  try {
    const r = await engine.filter({ ...parsed.value, signal: ctx.signal });
    const tookMs = Math.round((performance.now() - started) * 100) / 100;
    log.info("filter", { requestId, query: parsed.value.query, matched: r.matched, total: r.total, tookMs });
    return json(200, { ...r, tookMs });
  } catch (e) {
    if (e instanceof ConfigurationError) {
      return fail(
        problem({ status: 422, code: "UNPROCESSABLE_ENTITY", detail: e.message, instance, requestId, errors: e.issues.map((i) => ({ path: `$.scoring.${i.path}`, message: i.message })) }),
      );
    }
    throw e;
  }
}

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const defaultMax = opts.maxResults ?? 200;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    // a client that goes away (a newer keystroke) cancels its ranking
    const abort = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) abort.abort(new Error("client closed request"));
    });

    try {
      let body: unknown;
      const contentType = req.headers["content-type"]?.toString();
      if (req.method === "POST" && isJson(contentType)) {
        try {
          body = await readJson(req);
        } catch {
          return send(res, fail(problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid JSON", instance: url.pathname, requestId })));
        }
      }

      const reply = await dispatch(
        opts.engine,
        { method: req.method ?? "GET", url, requestId, body, contentType, signal: abort.signal },
        { started: start, defaultMax },
      );
      return send(res, reply);
    } catch (e) {
      if (abort.signal.aborted) {
        log.debug("request abandoned", { requestId });
        return;
      }
      log.error("request failed", { requestId, path: url.pathname }, e);
      return send(res, fail(problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId })));
    }
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function jsonPath(path: Array<string | number>): string {
  return path.map((p) => (typeof p === "number" ? `[${p}]` : `.${p}`)).join("");
}

function isJson(contentType: string | undefined): boolean {
  return (contentType ?? "").split(";")[0]!.trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  return raw.length ? JSON.parse(raw) : null;
}

function send(res: http.ServerResponse, reply: Reply): void {
  res.statusCode = reply.status;
  res.setHeader("content-type", reply.contentType);
  res.end(JSON.stringify(reply.body));
}
