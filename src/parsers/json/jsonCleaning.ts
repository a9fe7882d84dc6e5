/**
 * JSON output cleaning for model replies
 *
 * Models wrap JSON in `<json>` tags or code fences and occasionally emit raw
 * control characters next to the multi-byte text they are translating. A
 * strict JSON decoder rejects unescaped control characters, so the reply is
 * cleaned here before it is parsed.
 */

export type JsonSanitizer = (raw: string) => string;

const JSON_TAG_OPEN = "<json>";
const JSON_TAG_CLOSE = "</json>";
const FENCE_JSON = "```json";
const FENCE = "```";

const TAB = 9;
const LINE_FEED = 10;
const CARRIAGE_RETURN = 13;
const FIRST_PRINTABLE = 32;

const isDisallowedControl = (code: number): boolean =>
  code < FIRST_PRINTABLE && code !== TAB && code !== LINE_FEED && code !== CARRIAGE_RETURN;

/**
 * Remove code points 0-31 other than tab, LF and CR. Everything else,
 * including astral-plane characters, is kept in order.
 */
export const stripControlCharacters = (text: string): string => {
  let out = "";
  for (const char of text) {
    if (!isDisallowedControl(char.codePointAt(0) ?? 0)) {
      out += char;
    }
  }
  return out;
};

/**
 * Clean a model reply so that it can be handed to `JSON.parse`.
 *
 * The order of the steps matters: wrappers are only recognised at the very
 * ends of the trimmed text, and control characters are removed after the
 * wrappers are gone. Never throws.
 */
export const cleanJsonOutput: JsonSanitizer = (raw: string): string => {
  let text = raw.trim();

  if (text.startsWith(JSON_TAG_OPEN)) {
    text = text.slice(JSON_TAG_OPEN.length);
  }
  if (text.endsWith(JSON_TAG_CLOSE)) {
    text = text.slice(0, -JSON_TAG_CLOSE.length);
  }

  if (text.startsWith(FENCE_JSON)) {
    text = text.slice(FENCE_JSON.length);
  } else if (text.startsWith(FENCE)) {
    text = text.slice(FENCE.length);
  }
  if (text.endsWith(FENCE)) {
    text = text.slice(0, -FENCE.length);
  }

  return stripControlCharacters(text).trim();
};

/**
 * Method form of `cleanJsonOutput`, for engines that expose their cleaner as
 * a single-argument method. The receiver is ignored.
 */
export function cleanJsonOutputMethod(this: unknown, llmOutput: string): string {
  return cleanJsonOutput(llmOutput);
}
