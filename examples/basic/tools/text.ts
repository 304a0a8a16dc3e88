import { defineTool } from "@mcpml/core";
import { z } from "zod";

export const wordCount = defineTool({
  description: "Count the words in a text",
  parameters: z.object({
    text: z.string().describe("Text to count"),
  }),
  handler: ({ text }) => {
    const words = text.split(/\s+/).filter(Boolean);
    return { words: words.length, characters: text.length };
  },
});
