import express from "express";
import cors from "cors";
import type { ChartPayloadStore } from "./services/chartPayloads";
import { createChartsRouter } from "./routes/charts";
import { createSkillsRouter } from "./routes/skills";
import { config } from "./config";

export function createApp(store: ChartPayloadStore): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/skills", createSkillsRouter({ store }));
  app.use("/charts", createChartsRouter(store));

  return app;
}
