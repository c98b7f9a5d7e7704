import type { Value } from "../../core/types.ts";
import { toValue } from "../core/value.ts";

function parseOrUndefined(text: string): Value | undefined {
  try {
    return toValue(JSON.parse(text));
  } catch {
    return undefined;
  }
}

/**
 * Parse model output as JSON when possible.
 * - direct JSON
 * - prose + ```json ... ``` fenced blocks (takes the LAST json block)
 * - anything else comes back as the original text
 */
export function tryParseJson(text: string): Value {
  if (!text) return text;
  const raw = String(text);

  // 1) direct JSON
  const direct = parseOrUndefined(raw);
  if (direct !== undefined) return direct;

  // 2) extract LAST fenced ```json ... ```
  const fenceRegex = /```json\s*([\s\S]*?)\s*```/gi;
  let match: RegExpExecArray | null = null;
  let lastJsonBlock: string | null = null;

  while ((match = fenceRegex.exec(raw)) !== null) {
    lastJsonBlock = match[1];
  }

  if (lastJsonBlock) {
    const fenced = parseOrUndefined(lastJsonBlock.trim());
    if (fenced !== undefined) return fenced;
  }

  // 3) strip generic fences
  const cleanedGeneric = raw
    .trim()
    .replace(/^```json/i, "")
    .replace(/^```/i, "")
    .replace(/```$/i, "")
    .trim();

  const generic = parseOrUndefined(cleanedGeneric);
  return generic !== undefined ? generic : raw;
}
