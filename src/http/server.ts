import http from "node:http";
import { randomUUID } from "node:crypto";

import type { ServiceRole } from "../config.js";
import type { RebuildReport, SearchFilters, SearchResponse } from "../core/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { PROBLEM_CONTENT_TYPE, problem, problemForError, type FieldError, type Problem } from "./problem.js";
import { asNonNegativeInt, optionalParam, pushErr } from "./validation.js";
import type { Services } from "./services.js";

const VERSION = "0.1.0";

const SERVICE_NAMES: Record<ServiceRole, string> = {
  indexing: "indexing-service",
  search: "search-service",
  all: "book-index",
};

const UPDATE_PATH_RE = /^\/index\/update\/([^/]+)$/;

export interface ServerOptions {
  port?: number;
  /** which route groups to mount; defaults to both */
  role?: ServiceRole;
  services: Services;
  logger?: Logger;
}

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const role = opts.role ?? "all";
  const indexing = role !== "search";
  const searching = role !== "indexing";
  const { backend, indexer, engine } = opts.services;
  const logger = (opts.logger ?? silentLogger).child({ component: "http" });

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const started = Date.now();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const instance = url.pathname;

    res.on("finish", () => {
      logger.info("request", {
        requestId,
        method: req.method,
        path: url.pathname,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });

    try {
      if (req.method === "GET" && url.pathname === "/status") {
        return sendJson(res, 200, {
          service: SERVICE_NAMES[role],
          status: "running",
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (indexing && req.method === "POST" && url.pathname === "/index/rebuild") {
        const report = await indexer.rebuildIndex();
        return sendJson(res, 200, rebuildBody(report));
      }

      if (indexing && req.method === "GET" && url.pathname === "/index/status") {
        const stats = await backend.stats();
        return sendJson(res, 200, {
          books_indexed: stats.booksIndexed,
          total_words: stats.distinctWords,
          last_update: stats.lastUpdate,
          index_size_mb: Math.round((stats.sizeBytes / (1024 * 1024)) * 100) / 100,
        });
      }

      const rawId = indexing && req.method === "POST" ? UPDATE_PATH_RE.exec(url.pathname)?.[1] : undefined;
      if (rawId !== undefined) {
        const bookId = asNonNegativeInt(rawId);
        if (bookId === undefined) {
          const errors: FieldError[] = [];
          pushErr(errors, "book_id", "must be a non-negative integer");
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid book id", instance, requestId, errors }));
        }

        await indexer.indexBook(bookId);
        return sendJson(res, 200, { book_id: bookId, status: "updated" });
      }

      if (searching && req.method === "GET" && url.pathname === "/search") {
        const params = url.searchParams;
        const errors: FieldError[] = [];

        const filters: SearchFilters = {};
        const author = optionalParam(params, "author");
        if (author !== undefined) filters.author = author;
        const language = optionalParam(params, "language");
        if (language !== undefined) filters.language = language;

        const yearParam = optionalParam(params, "year");
        if (yearParam !== undefined) {
          const year = asNonNegativeInt(yearParam);
          if (year === undefined) pushErr(errors, "year", "must be an integer");
          else filters.year = year;
        }

        let limit: number | undefined;
        const limitParam = optionalParam(params, "limit");
        if (limitParam !== undefined) {
          limit = asNonNegativeInt(limitParam);
          if (limit === undefined || limit < 1) pushErr(errors, "limit", "must be a positive integer");
        }

        if (errors.length) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));
        }

        const result = await engine.search(params.get("q") ?? "", filters, limit);
        return sendJson(res, 200, searchBody(result));
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance, requestId }));
    } catch (e) {
      const p = problemForError(e, { instance, requestId });
      if (p.status >= 500) logger.error("request failed", e, { requestId, path: url.pathname });
      return sendProblem(res, p);
    }
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 0;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function rebuildBody(r: RebuildReport) {
  return {
    status: r.status,
    books_processed: r.booksProcessed,
    books_failed: r.booksFailed,
    failures: r.failures.map((f) => ({ book_id: f.bookId, code: f.code, message: f.message })),
    elapsed_time: `${(r.elapsedMs / 1000).toFixed(2)}s`,
  };
}

function searchBody(r: SearchResponse) {
  const filters: Record<string, string> = {};
  if (r.filters.author !== undefined) filters.author = r.filters.author;
  if (r.filters.language !== undefined) filters.language = r.filters.language;
  if (r.filters.year !== undefined) filters.year = String(r.filters.year);

  return {
    query: r.query,
    filters,
    count: r.count,
    results: r.results.map((x) => ({
      book_id: x.bookId,
      title: x.title,
      author: x.author,
      language: x.language,
      year: x.year ?? null,
      score: x.score,
      matches: x.matches,
    })),
  };
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
