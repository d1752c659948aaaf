export type PromptCategory = 'summary' | 'rating';

export interface PromptInput {
  transcript: string;
  language: string;
  /** Replaces the default instructions; replies to such prompts are not cached. */
  instructions?: string;
}

const DEFAULT_INSTRUCTIONS: Record<PromptCategory, (language: string) => string> = {
  summary: (language) => `You are an expert at summarizing YouTube video transcripts.
Provide a clear and concise summary that captures the essence of the video.
The summary must be written in ${language}. Format your response in Markdown:
1. A short, catchy title (heading level 2).
2. A one-paragraph overview of the main topic and conclusion.
3. A "Key Takeaways" section (heading level 3) with the 3-5 most important points as bullets.`,
  rating: (language) => `You analyse financial commentary videos.
List every stock, index or asset discussed in the transcript and the speaker's sentiment towards it.
Reply with a JSON array only, no prose. Each element is an object with the keys
"name", "ticker" (or null), "sentiment" ("bullish", "bearish" or "neutral") and "reason".
Write "reason" in ${language}.`,
};

export function isDefaultPrompt(input: PromptInput): boolean {
  return !input.instructions?.trim();
}

export function buildPrompt(category: PromptCategory, input: PromptInput): string {
  const instructions = isDefaultPrompt(input)
    ? DEFAULT_INSTRUCTIONS[category](input.language)
    : `${input.instructions?.trim()}\nRespond in ${input.language}.`;
  return `${instructions}

Here is the transcript:
---
${input.transcript}
---`;
}
