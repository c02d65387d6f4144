import { z } from "zod";

// Shape the model is asked to return for a reading
export const InterpretationSchema = z.object({
  summary: z.string().min(1).max(2000),
  positions: z
    .array(
      z.object({
        position: z.string().min(1),
        card: z.string().min(1),
        interpretation: z.string().min(1).max(1200),
      })
    )
    .min(1),
  advice: z.array(z.string()).max(5).default([]),
  reflective_question: z.string().max(300),
});

export type Interpretation = z.infer<typeof InterpretationSchema>;

export const INTERPRETATION_FIELDS = {
  summary: "string",
  positions: "array",
  advice: "array",
  reflective_question: "string",
} as const;
