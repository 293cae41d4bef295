import { z } from "zod";
import { INTENTS } from "../types/state";

export const IntentSpec = z.enum(INTENTS);

export const PlannedCallSpec = z.object({
  tool_name: z.string().trim().min(1, "tool_plan[].tool_name is required"),
  args: z.record(z.unknown()).default({}),
  reasoning: z.string().optional(),
});

export const IntentPlanSpec = z.object({
  intent: IntentSpec,
  reasoning: z.string().optional(),
  analysis_focus: z.string().optional(),
  tool_plan: z.array(PlannedCallSpec).default([]),
});

/**
 * Intent plan schema bound to the tools that actually exist. Unknown tool
 * names and oversized plans fail validation here, before anything runs.
 */
export function buildIntentPlanSchema(toolNames: readonly string[], maxPlannedCalls: number) {
  const known = new Set(toolNames);
  return IntentPlanSpec.superRefine((plan, ctx) => {
    plan.tool_plan.forEach((call, i) => {
      if (!known.has(call.tool_name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tool_plan", i, "tool_name"],
          message: `Unknown tool: ${call.tool_name}`,
        });
      }
    });
    if (plan.tool_plan.length > maxPlannedCalls) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: maxPlannedCalls,
        inclusive: true,
        type: "array",
        path: ["tool_plan"],
        message: `tool_plan must include at most ${maxPlannedCalls} calls`,
      });
    }
  });
}

export type IntentPlan = z.infer<typeof IntentPlanSpec>;
export type PlannedCall = z.infer<typeof PlannedCallSpec>;

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}
