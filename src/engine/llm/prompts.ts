/**
 * Prompts for the batch paragraph translator.
 */

export interface PromptContext {
  langIn: string;
  langOut: string;
  /** Replaces the default translator persona; output format rules are always kept. */
  customSystemPrompt: string | null;
}

const defaultPersona = ({ langIn, langOut }: PromptContext): string =>
  `You are a professional document translator. Translate text from ${langIn} to ${langOut}. ` +
  `Preserve numbers, formulas, URLs and inline code exactly as written. Do not add explanations.`;

const persona = (context: PromptContext): string =>
  context.customSystemPrompt ?? defaultPersona(context);

export function buildBatchSystemPrompt(context: PromptContext): string {
  return [
    persona(context),
    "",
    "The user sends a JSON array of objects with an integer \"id\" and the source text in \"input\".",
    "Reply with a JSON array containing one object per input, with the same \"id\" and the translation in \"output\".",
    "Wrap the JSON in <json></json> tags and output nothing else.",
    "Example reply:",
    "<json>[{\"id\": 0, \"output\": \"...\"}]</json>",
  ].join("\n");
}

export function buildSingleSystemPrompt(context: PromptContext): string {
  return `${persona(context)}\nOutput only the translation of the user's text, without quotes, tags or commentary.`;
}
