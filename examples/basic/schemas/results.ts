import { z } from "zod";

export const SumResult = z.number();

export const Sentiment = z.object({
  label: z.enum(["positive", "negative", "neutral"]),
  confidence: z.number().min(0).max(1),
});
