import { once } from "events";
import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type Database from "better-sqlite3";
import { createApp } from "../app";
import { getValue } from "../compiler/documentPatcher";
import { initializeDatabase, openDatabase } from "../database";
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

function postSkill(name: string, body: Record<string, unknown>): Promise<Response> {
  return fetch(`${baseUrl}/skills/${name}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("GET /skills", () => {
  it("lists every skill with its parameters", async () => {
    const res = await fetch(`${baseUrl}/skills`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toHaveProperty("skills.length", 4);
    expect(body).toHaveProperty("skills.0.name", "Describe Chart");
    expect(body).toHaveProperty("skills.0.parameters", [
      {
        name: "saved_payload_id",
        description: "Identifier returned when the chart payload was saved.",
        required: true,
      },
    ]);
  });
});

describe("POST /skills/:name", () => {
  it("seeds and then customizes with a structured updates object", async () => {
    const seeded = await postSkill("seed-sample-chart", { saved_payload_id: "demo" });
    expect(seeded.status).toBe(200);
    expect(await seeded.json()).toMatchObject({ finalPrompt: "Chart saved to address demo" });

    const res = await postSkill("customize-chart", { saved_payload_id: "demo", updates: { "title.text": "X" } });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ narrative: "title.text: Quarterly Overview -> X" });
    expect(getValue(store.load("demo"), ["data", "title", "text"])).toBe("X");
  });

  it("accepts updates as a list of records", async () => {
    await postSkill("seed-sample-chart", { saved_payload_id: "demo" });
    const res = await postSkill("Customize Chart", {
      saved_payload_id: "demo",
      updates: [{ path: "legend.enabled", value: false }],
    });
    expect(await res.json()).toMatchObject({ narrative: "legend.enabled: (unset) -> false" });
    expect(getValue(store.load("demo"), ["data", "legend", "enabled"])).toBe(false);
  });

  it("passes non-string parameters to the skill as JSON text", async () => {
    const res = await postSkill("seed-sample-chart", { saved_payload_id: 42 });
    expect(await res.json()).toMatchObject({ finalPrompt: "Chart saved to address 42" });
    expect(store.list()).toEqual(["42"]);
  });

  it("answers with a prompt when a required parameter is missing", async () => {
    const res = await postSkill("display-chart", {});
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      finalPrompt: "A saved payload ID is required to display the chart.",
      narrative: "",
      visualizations: [],
      exportData: [],
    });
  });

  it("answers with the error message for an unknown payload", async () => {
    const res = await postSkill("describe-chart", { saved_payload_id: "nope" });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ finalPrompt: "No chart payload found for ID nope." });
  });

  it("answers 404 for an unknown skill", async () => {
    const res = await postSkill("draw-chart", {});
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Skill not found." });
  });
});
