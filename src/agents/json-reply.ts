/**
 * JSON extraction from model replies.
 *
 * Models are asked for a bare JSON object but sometimes wrap it in a fenced
 * block or surround it with prose.
 *
 * @packageDocumentation
 */

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extracts the first JSON value found in a reply.
 *
 * Tries, in order: the whole reply, the first fenced block, and the span from
 * the first `{` to the last `}`.
 *
 * @returns The parsed value, or undefined when nothing parses.
 *
 * @example
 * ```typescript
 * extractJson('Here you go:\n```json\n{"topics": []}\n```'); // { topics: [] }
 * ```
 */
export function extractJson(reply: string): unknown {
  const trimmed = reply.trim();
  const direct = tryParse(trimmed);
  if (direct !== undefined) {
    return direct;
  }

  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(trimmed);
  if (fenced?.[1] !== undefined) {
    const inner = tryParse(fenced[1].trim());
    if (inner !== undefined) {
      return inner;
    }
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return tryParse(trimmed.slice(start, end + 1));
  }
  return undefined;
}

/**
 * Cleans a plain-text reply meant to be shown as-is: trims it and drops a
 * single pair of wrapping quotes or a fenced block.
 */
export function extractPlainText(reply: string): string {
  let text = reply.trim();
  const fenced = /^```[a-z]*\s*([\s\S]*?)```$/.exec(text);
  if (fenced?.[1] !== undefined) {
    text = fenced[1].trim();
  }
  const quoted = /^["«](.*)["»]$/s.exec(text);
  if (quoted?.[1] !== undefined) {
    text = quoted[1].trim();
  }
  return text;
}
