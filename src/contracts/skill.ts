import type { JsonMap, JsonNode } from "./chartDocument";
import type { ChartPayloadStore } from "../services/chartPayloads";

export type SkillParameter = {
  name: string;
  description: string;
  required: boolean;
  // Shown instead of a generic message when a required parameter is missing.
  missingPrompt?: string;
};

export type SkillVisualization = {
  title: string;
  layout: string;
  content: JsonMap;
};

export type SkillOutput = {
  finalPrompt: string;
  narrative: string;
  visualizations: SkillVisualization[];
  exportData: JsonNode[];
};

export type SkillArgs = Record<string, string | undefined>;

export type SkillContext = {
  store: ChartPayloadStore;
};

export interface SkillDefinition {
  name: string;
  description: string;
  parameters: SkillParameter[];
  run(args: SkillArgs, ctx: SkillContext): SkillOutput;
}

export function skillOutput(partial: Partial<SkillOutput> & { finalPrompt: string }): SkillOutput {
  return {
    narrative: "",
    visualizations: [],
    exportData: [],
    ...partial,
  };
}
