import type { SkillArgs, SkillContext, SkillDefinition, SkillOutput } from "../contracts/skill";
import { skillOutput } from "../contracts/skill";
import { ChartwrightError } from "../compiler/errors";
import { trace } from "../utils/trace";
import { withTraceContext } from "../utils/traceContext";
import { customizeChartSkill } from "./customizeChart";
import { describeChartSkill } from "./describeChart";
import { displayChartSkill } from "./displayChart";
import { seedSampleChartSkill } from "./seedSampleChart";

export const CHART_SKILLS: SkillDefinition[] = [
  describeChartSkill,
  customizeChartSkill,
  displayChartSkill,
  seedSampleChartSkill,
];

export function skillSlug(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "-");
}

/** Accepts the display name ("Customize Chart") or its slug ("customize-chart"). */
export function getSkillByName(name: string): SkillDefinition | undefined {
  const slug = skillSlug(name);
  return CHART_SKILLS.find((s) => skillSlug(s.name) === slug);
}

export class UnknownSkillError extends ChartwrightError {
  constructor(name: string) {
    super(`Unknown skill "${name}".`, 404);
    this.name = "UnknownSkillError";
  }
}

/**
 * Runs a skill by name. Missing required parameters and chart errors come back as the
 * output's `finalPrompt`; anything unexpected is rethrown.
 */
export function runSkill(name: string, args: SkillArgs, ctx: SkillContext): SkillOutput {
  const skill = getSkillByName(name);
  if (!skill) throw new UnknownSkillError(name);

  for (const param of skill.parameters) {
    if (!param.required) continue;
    const value = args[param.name];
    if (typeof value !== "string" || !value.trim()) {
      return skillOutput({ finalPrompt: param.missingPrompt ?? `Parameter "${param.name}" is required.` });
    }
  }

  return withTraceContext({ skill: skill.name, payloadId: args.saved_payload_id }, () => {
    trace("skill.start");
    try {
      const output = skill.run(args, ctx);
      trace("skill.done");
      return output;
    } catch (err) {
      if (err instanceof ChartwrightError) {
        trace("skill.failed", { error: err.name, message: err.message });
        return skillOutput({ finalPrompt: err.message });
      }
      throw err;
    }
  });
}
