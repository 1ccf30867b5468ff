import crypto from "crypto";
import sampleChartJson from "../data/sampleChart.json";
import type { JsonMap } from "../contracts/chartDocument";
import { getChartKind, JsonMapSchema } from "../contracts/chartDocument";
import type { SkillDefinition } from "../contracts/skill";
import { skillOutput } from "../contracts/skill";
import { appendHistoryEntry, ensureMetadata } from "../services/chartPayloads";

const SAMPLE_CHART: JsonMap = JsonMapSchema.parse(sampleChartJson);

export function buildSamplePayload(): JsonMap {
  const data = structuredClone(SAMPLE_CHART);
  const payload: JsonMap = { type: "highcharts", data };
  ensureMetadata(payload);
  appendHistoryEntry(payload, {
    actor: "Seed Sample Chart",
    action: "initial_save",
    details: { chart_type: getChartKind(data) },
  });
  return payload;
}

export const seedSampleChartSkill: SkillDefinition = {
  name: "Seed Sample Chart",
  description: "Save a sample area chart so it can be described, customized and displayed.",
  parameters: [
    {
      name: "saved_payload_id",
      description: "Identifier to save the sample under; a new one is generated when omitted.",
      required: false,
    },
  ],
  run: (args, ctx) => {
    const payloadId = args.saved_payload_id?.trim() || crypto.randomUUID();
    const savedId = ctx.store.persist(buildSamplePayload(), payloadId);
    return skillOutput({ finalPrompt: `Chart saved to address ${savedId}` });
  },
};
