import { z } from "zod";

export const DecisionSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("CALCULATE_SIGNAL"),
    target: z.enum(["ownership_churn", "incident_similarity"]),
    reasoning: z.string(),
  }),
  z.object({ action: z.literal("EXPAND_CONTEXT"), reasoning: z.string() }),
  z.object({ action: z.literal("FINALIZE"), reasoning: z.string() }),
]);

export type Decision = z.infer<typeof DecisionSchema>;

export const SynthesisSchema = z.object({
  risk_level: z.enum(["LOW", "MEDIUM", "HIGH"]),
  confidence: z.number().min(0).max(1),
  key_evidence: z.array(z.string()),
  recommendations: z.array(z.string()),
  reasoning_text: z.string().min(1),
});

/** Parses model output, tolerating prose or code fences before the JSON body. */
export function extractJson(value: string): unknown {
  const trimmed = value.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(trimmed);
    if (fenced) return JSON.parse(fenced[1]);
    const start = trimmed.indexOf("{");
    const end = trimmed.lastIndexOf("}");
    if (start < 0 || end <= start) throw new Error("No JSON object found in response");
    return JSON.parse(trimmed.slice(start, end + 1));
  }
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
