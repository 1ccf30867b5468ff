import type { SkillDefinition } from "../contracts/skill";
import { skillOutput } from "../contracts/skill";
import { editableFields } from "../schema/editableFields";
import { extractChartOptions, formatValue, summarizeOptions } from "../services/chartPayloads";
import { prettyJson } from "../utils/jsonParser";

export const describeChartSkill: SkillDefinition = {
  name: "Describe Chart",
  description: "Summarize an existing chart payload and highlight editable properties.",
  parameters: [
    {
      name: "saved_payload_id",
      description: "Identifier returned when the chart payload was saved.",
      required: true,
      missingPrompt: "A saved payload ID is required to describe a chart.",
    },
  ],
  run: (args, ctx) => {
    const payload = ctx.store.load(args.saved_payload_id ?? "");
    const options = extractChartOptions(payload);
    const summary = summarizeOptions(options);

    const lines = [`Chart type: ${summary.chartType}`, `Series count: ${summary.seriesCount}`];
    for (const serie of summary.series) {
      const color = serie.color ? formatValue(serie.color) : "default";
      const dashStyle = serie.dashStyle ? formatValue(serie.dashStyle) : "solid";
      lines.push(`Series ${serie.index} (${formatValue(serie.name)}): color=${color}, dashStyle=${dashStyle}`);
    }

    return skillOutput({
      finalPrompt: prettyJson({
        summary,
        editable_fields: editableFields(options),
        chart_options: options,
      }),
      narrative: lines.join("\n"),
    });
  },
};
