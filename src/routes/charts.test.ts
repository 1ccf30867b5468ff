import { once } from "events";
import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type Database from "better-sqlite3";
import { createApp } from "../app";
import { createChartPayloadDb, initializeDatabase, openDatabase } from "../database";
import { createSqliteChartStore, type ChartPayloadStore } from "../services/chartPayloads";

let db: Database.Database;
let store: ChartPayloadStore;
let server: Server;
let baseUrl: string;

beforeEach(async () => {
  db = openDatabase(":memory:");
  initializeDatabase(db);
  store = createSqliteChartStore(db);
  server = createApp(store).listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server did not bind a TCP port.");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  db.close();
});

describe("GET /charts", () => {
  it("lists saved ids", async () => {
    store.persist({ chart: { type: "line" } }, "chart-1");
    const res = await fetch(`${baseUrl}/charts?limit=5`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ids: ["chart-1"] });
  });

  it("rejects a limit outside 1-500", async () => {
    for (const limit of ["0", "501", "abc"]) {
      const res = await fetch(`${baseUrl}/charts?limit=${limit}`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "limit must be an integer between 1 and 500." });
    }
  });
});

describe("GET /charts/:id", () => {
  it("returns the payload with its editable fields", async () => {
    const payload = { type: "highcharts", data: { chart: { type: "pie" }, series: [{ name: "Share" }] } };
    store.persist(payload, "pie-1");

    const res = await fetch(`${baseUrl}/charts/pie-1`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({ payload });
    expect(body).toHaveProperty("editable_fields.length", 15 + 4 + 10);
    expect(body).toHaveProperty("editable_fields.16", {
      path: "plotOptions.pie.dataLabels.distance",
      description: "Pie data label distance",
    });
  });

  it("answers 404 for an unknown id", async () => {
    const res = await fetch(`${baseUrl}/charts/missing`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Chart not found." });
  });

  it("answers 422 for a stored payload that is not a mapping", async () => {
    createChartPayloadDb(db).upsert("broken", "[1, 2, 3]");
    const res = await fetch(`${baseUrl}/charts/broken`);
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "Stored chart is malformed." });
  });
});

describe("DELETE /charts/:id", () => {
  it("removes a chart once", async () => {
    store.persist({}, "gone");

    const first = await fetch(`${baseUrl}/charts/gone`, { method: "DELETE" });
    expect(first.status).toBe(204);

    const second = await fetch(`${baseUrl}/charts/gone`, { method: "DELETE" });
    expect(second.status).toBe(404);
    expect(await second.json()).toEqual({ error: "Chart not found." });
    expect(store.list()).toEqual([]);
  });
});

describe("GET /health", () => {
  it("reports ok", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(await res.json()).toEqual({ ok: true });
  });
});
