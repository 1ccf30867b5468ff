import type { SkillDefinition } from "../contracts/skill";
import { skillOutput } from "../contracts/skill";
import {
  appendHistoryEntry,
  changeLogJson,
  extractChartOptions,
  formatValue,
} from "../services/chartPayloads";
import { applyUpdateRecords, collectUpdates } from "../services/updateOrchestrator";
import { prettyJson } from "../utils/jsonParser";

export const NO_UPDATES_PROMPT =
  "Provide chart updates as JSON, an array of path/value pairs, key=value lines, or recognizable instructions.";

export const customizeChartSkill: SkillDefinition = {
  name: "Customize Chart",
  description: "Apply structured chart option updates and editing instructions to a saved payload.",
  parameters: [
    {
      name: "saved_payload_id",
      description: "Identifier returned when the chart payload was saved.",
      required: true,
      missingPrompt: "A saved payload ID is required to customize a chart.",
    },
    {
      name: "updates",
      description:
        'JSON or key=value list describing chart option updates (e.g. {"series[0].color": "#ff0000"}).',
      required: false,
    },
    {
      name: "instructions",
      description: "Optional editing instructions, e.g. \"make series 1 red dashed with line width 3\".",
      required: false,
    },
  ],
  run: (args, ctx) => {
    const payloadId = args.saved_payload_id ?? "";
    const payload = ctx.store.load(payloadId);
    const options = extractChartOptions(payload);
    const instructions = args.instructions?.trim() || null;

    const updates = collectUpdates(options, args.updates, instructions);
    if (updates.length === 0) {
      return skillOutput({ finalPrompt: NO_UPDATES_PROMPT });
    }

    const changes = applyUpdateRecords(options, updates);
    const changeLog = changeLogJson(changes);

    appendHistoryEntry(payload, {
      actor: "Customize Chart",
      action: "apply_updates",
      details: { instructions, changes: changeLog },
    });

    const savedId = ctx.store.persist(payload, payloadId);

    return skillOutput({
      finalPrompt: prettyJson({
        saved_payload_id: savedId,
        changes: changeLog,
        chart_options: options,
      }),
      narrative: changes.map((c) => `${c.path}: ${formatValue(c.before)} -> ${formatValue(c.after)}`).join("\n"),
    });
  },
};
