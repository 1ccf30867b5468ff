import { Router } from "express";
import type { SkillArgs, SkillContext } from "../contracts/skill";
import { errorStatus } from "../compiler/errors";
import { CHART_SKILLS, runSkill } from "../skills/registry";

function toSkillArgs(body: unknown): SkillArgs {
  const args: SkillArgs = {};
  if (!body || typeof body !== "object" || Array.isArray(body)) return args;
  for (const [key, value] of Object.entries(body)) {
    if (value === null || value === undefined) continue;
    // Structured `updates` are accepted too; skills take every parameter as text.
    args[key] = typeof value === "string" ? value : JSON.stringify(value);
  }
  return args;
}

export function createSkillsRouter(ctx: SkillContext): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      skills: CHART_SKILLS.map((s) => ({
        name: s.name,
        description: s.description,
        parameters: s.parameters.map((p) => ({ name: p.name, description: p.description, required: p.required })),
      })),
    });
  });

  router.post("/:name", (req, res) => {
    try {
      const output = runSkill(req.params.name, toSkillArgs(req.body), ctx);
      res.json(output);
    } catch (err: unknown) {
      const status = errorStatus(err);
      if (status >= 500) {
        console.error("Error in POST /skills/:name:", err);
      }
      res.status(status).json({
        error: status === 404 ? "Skill not found." : "Failed to run skill.",
      });
    }
  });

  return router;
}
