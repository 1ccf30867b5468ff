import { Router } from "express";
import { z } from "zod";
import type { ChartPayloadStore } from "../services/chartPayloads";
import { extractChartOptions } from "../services/chartPayloads";
import { editableFields } from "../schema/editableFields";
import { errorStatus } from "../compiler/errors";

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export function createChartsRouter(store: ChartPayloadStore): Router {
  const router = Router();

  router.get("/", (req, res) => {
    const parsed = ListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: "limit must be an integer between 1 and 500." });
    }
    res.json({ ids: store.list(parsed.data.limit) });
  });

  router.get("/:id", (req, res) => {
    try {
      const payload = store.load(req.params.id);
      res.json({ payload, editable_fields: editableFields(extractChartOptions(payload)) });
    } catch (err: unknown) {
      const status = errorStatus(err);
      if (status >= 500) {
        console.error("Error in GET /charts/:id:", err);
      }
      res.status(status).json({
        error: status === 404 ? "Chart not found." : status === 422 ? "Stored chart is malformed." : "Failed to fetch chart.",
      });
    }
  });

  router.delete("/:id", (req, res) => {
    try {
      const removed = store.remove(req.params.id);
      if (!removed) return res.status(404).json({ error: "Chart not found." });
      res.status(204).end();
    } catch (err: unknown) {
      console.error("Error in DELETE /charts/:id:", err);
      res.status(500).json({ error: "Failed to delete chart." });
    }
  });

  return router;
}
