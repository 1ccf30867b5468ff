import type { JsonMap } from "../contracts/chartDocument";
import type { SkillDefinition, SkillVisualization } from "../contracts/skill";
import { skillOutput } from "../contracts/skill";
import { extractChartOptions } from "../services/chartPayloads";
import { prettyJson } from "../utils/jsonParser";

export function buildChartVisualization(options: JsonMap): SkillVisualization {
  return {
    title: "Display Chart",
    layout: "standard",
    content: {
      type: "Document",
      gap: "0px",
      style: {
        backgroundColor: "#ffffff",
        width: "100%",
        height: "max-content",
      },
      children: [
        {
          name: "HighchartsChart0",
          type: "HighchartsChart",
          minHeight: "400px",
          options,
        },
      ],
    },
  };
}

export const displayChartSkill: SkillDefinition = {
  name: "Display Chart",
  description: "Retrieve a saved chart payload and present it to the user.",
  parameters: [
    {
      name: "saved_payload_id",
      description: "Identifier returned when the chart payload was saved.",
      required: true,
      missingPrompt: "A saved payload ID is required to display the chart.",
    },
  ],
  run: (args, ctx) => {
    const payload = ctx.store.load(args.saved_payload_id ?? "");
    return skillOutput({
      finalPrompt: prettyJson(payload),
      visualizations: [buildChartVisualization(extractChartOptions(payload))],
    });
  },
};
