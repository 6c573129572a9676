import type http from "node:http";

import { afterEach, describe, expect, it } from "vitest";
import type { ServiceRole } from "../../config.js";
import type { StorageBackend } from "../../core/storageBackend.js";
import { KeyValueStorageBackend, MemorySetStore, SqliteStorageBackend } from "../../core/impl/index.js";
import { MemoryBookSource, header } from "../../core/impl/__tests__/fixtures.js";
import { createServices } from "../services.js";
import { startServer } from "../server.js";

function library(): MemoryBookSource {
  return new MemoryBookSource()
    .add(1342, {
      header: header({ title: "Pride and Prejudice", author: "Jane Austen", release: "June 1, 1998", language: "en" }),
      body: "It is a truth universally acknowledged",
    })
    .add(11, {
      header: header({ title: "Alice's Adventures in Wonderland", author: "Lewis Carroll", release: "1865", language: "en" }),
      body: "alice fell down the rabbit hole",
    });
}

describe("http server", () => {
  let server: http.Server | undefined;
  let backend: StorageBackend | undefined;

  afterEach(async () => {
    await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
    await backend?.close();
    server = undefined;
    backend = undefined;
  });

  async function start(opts: { role?: ServiceRole; backend?: StorageBackend; source?: MemoryBookSource } = {}) {
    backend = opts.backend ?? new KeyValueStorageBackend(new MemorySetStore());
    const services = createServices({ backend, source: opts.source ?? library() });
    const started = await startServer({ port: 0, role: opts.role, services });
    server = started.server;
    const base = `http://127.0.0.1:${started.port}`;
    return {
      get: (path: string) => fetch(base + path),
      post: (path: string) => fetch(base + path, { method: "POST" }),
    };
  }

  it("reports service status", async () => {
    const api = await start();
    const res = await api.get("/status");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ service: "book-index", status: "running", version: "0.1.0" });
  });

  it("indexes a book and finds it by title word", async () => {
    const api = await start();

    const update = await api.post("/index/update/1342");
    expect(update.status).toBe(200);
    expect(await update.json()).toEqual({ book_id: 1342, status: "updated" });

    const search = await api.get("/search?q=pride");
    expect(search.status).toBe(200);
    expect(await search.json()).toEqual({
      query: "pride",
      filters: {},
      count: 1,
      results: [
        {
          book_id: 1342,
          title: "Pride and Prejudice",
          author: "Jane Austen",
          language: "en",
          year: 1998,
          score: 1,
          matches: ["pride"],
        },
      ],
    });
  });

  it("answers 500 for a book the source does not have", async () => {
    const api = await start();
    const res = await api.post("/index/update/999999");
    expect(res.status).toBe(500);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await res.json()).toMatchObject({ status: 500, code: "NOT_FOUND", detail: "book 999999 not found" });
  });

  it("rejects a non-numeric book id", async () => {
    const api = await start();
    const res = await api.post("/index/update/abc");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: "INVALID_ARGUMENT",
      errors: [{ path: "book_id", message: "must be a non-negative integer" }],
    });
  });

  it("rebuilds and reports per-book failures without failing the run", async () => {
    const source = library();
    const locate = source.locate.bind(source);
    source.locate = async (id) => (id === 11 ? undefined : locate(id));
    const api = await start({ source });

    const res = await api.post("/index/rebuild");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "rebuilt",
      books_processed: 1,
      books_failed: 1,
      failures: [{ book_id: 11, code: "NOT_FOUND", message: "book 11 not found" }],
      elapsed_time: expect.stringMatching(/^\d+\.\d{2}s$/),
    });
  });

  it("reports index status", async () => {
    const api = await start({ backend: new SqliteStorageBackend({ path: ":memory:" }) });
    await api.post("/index/rebuild");

    const res = await api.get("/index/status");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      books_indexed: 2,
      // pride, and, prejudice, truth, universally, acknowledged, alice, adventures, wonderland, fell, down, the, rabbit, hole
      total_words: 14,
      last_update: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
      index_size_mb: expect.any(Number),
    });
  });

  it("rejects a blank query with 400", async () => {
    const api = await start();
    for (const q of ["", "%20%20"]) {
      const res = await api.get(`/search?q=${q}`);
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ status: 400, code: "INVALID_QUERY" });
    }
    expect((await api.get("/search")).status).toBe(400);
  });

  it("returns an empty result for unknown words", async () => {
    const api = await start();
    await api.post("/index/rebuild");
    const res = await api.get("/search?q=xyzneverexistingword");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ query: "xyzneverexistingword", filters: {}, count: 0, results: [] });
  });

  it("echoes filters as strings and applies them", async () => {
    const api = await start();
    await api.post("/index/rebuild");

    const res = await api.get("/search?q=alice+pride&author=carroll&language=en&year=1865&limit=5");
    expect(await res.json()).toMatchObject({
      filters: { author: "carroll", language: "en", year: "1865" },
      count: 1,
      results: [{ book_id: 11, score: 1, matches: ["alice"] }],
    });
  });

  it("validates year and limit", async () => {
    const api = await start();
    const res = await api.get("/search?q=alice&year=18x5&limit=0");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: "INVALID_ARGUMENT",
      errors: [
        { path: "year", message: "must be an integer" },
        { path: "limit", message: "must be a positive integer" },
      ],
    });
  });

  it("answers 503 when the backend fails at runtime", async () => {
    const store = new MemorySetStore();
    const api = await start({ backend: new KeyValueStorageBackend(store) });
    await store.close();

    const res = await api.get("/search?q=alice");
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ code: "BACKEND_UNAVAILABLE" });
  });

  it("mounts only the search routes for the search role", async () => {
    const api = await start({ role: "search" });
    expect(await (await api.get("/status")).json()).toMatchObject({ service: "search-service" });
    expect((await api.post("/index/rebuild")).status).toBe(404);
    expect((await api.get("/search?q=alice")).status).toBe(200);
  });

  it("mounts only the indexing routes for the indexing role", async () => {
    const api = await start({ role: "indexing" });
    expect((await api.get("/search?q=alice")).status).toBe(404);
    expect((await api.post("/index/update/11")).status).toBe(200);
  });
});
