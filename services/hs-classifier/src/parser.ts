import type { ParseStrategy } from "./types.js";

export type ParseOutcome =
  | { ok: true; strategy: ParseStrategy; value: Record<string, unknown> }
  | { ok: false; reason: string };

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)\s*```/i;

const SCRAPED_FIELDS = [
  "stat_suffix",
  "article_description",
  "product_description",
  "reasoning",
  "confidence_score",
] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(candidate: string): Record<string, unknown> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch {
    return undefined;
  }
  return isRecord(value) ? value : undefined;
}

export function extractFenced(text: string): string | undefined {
  const match = FENCE_PATTERN.exec(text);
  return match?.[1];
}

/**
 * Cuts the text after the bracket that closes the first object, or appends the
 * closers a truncated reply is missing. String contents are skipped.
 */
export function balanceBrackets(text: string): string {
  const expected: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      expected.push("}");
    } else if (char === "[") {
      expected.push("]");
    } else if ((char === "}" || char === "]") && expected[expected.length - 1] === char) {
      expected.pop();
      if (expected.length === 0) {
        return text.slice(0, i + 1);
      }
    }
  }

  const closers = expected.reverse().join("");
  return `${text}${inString ? '"' : ""}${closers}`;
}

/** Removes `//` comments that sit outside string literals. */
export function stripLineComments(text: string): string {
  let output = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === "/" && text[i + 1] === "/") {
      const newline = text.indexOf("\n", i);
      if (newline === -1) {
        break;
      }
      i = newline - 1;
      continue;
    }

    if (char === '"') {
      inString = true;
    }
    output += char;
  }

  return output;
}

function unescapeStructure(text: string): string {
  if (!/\\[{}[\]]/.test(text)) {
    return text;
  }
  return text
    .replace(/\\([{}[\]])/g, "$1")
    .replace(/\\"/g, '"');
}

function repair(text: string): Record<string, unknown> | undefined {
  let working = (extractFenced(text) ?? text).trim();
  // an opening fence the model never closed
  working = working.replace(/^```(?:json)?\s*/i, "");

  const start = working.indexOf("{");
  if (start === -1) {
    return undefined;
  }

  working = unescapeStructure(working.slice(start));
  working = stripLineComments(working);
  working = balanceBrackets(working);
  working = working.replace(/,(\s*[}\]])/g, "$1");

  return tryParseObject(working);
}

function decodeString(raw: string): string {
  try {
    const decoded: unknown = JSON.parse(`"${raw}"`);
    return typeof decoded === "string" ? decoded : raw;
  } catch {
    return raw;
  }
}

function scrapeField(segment: string, name: string): string | number | undefined {
  const pattern = new RegExp(`"${name}"\\s*:\\s*(?:"((?:[^"\\\\]|\\\\.)*)"|(-?\\d+(?:\\.\\d+)?))`);
  const match = pattern.exec(segment);
  if (!match) {
    return undefined;
  }
  if (match[1] !== undefined) {
    return decodeString(match[1]);
  }
  return Number(match[2]);
}

/**
 * Last resort: pull candidate fields out of text that will not parse. Each
 * `hs_code` starts a segment that runs to the next one, and the remaining
 * fields are looked up inside that segment.
 */
export function scrapeClassifications(text: string): Record<string, unknown>[] {
  const codePattern = /"hs_code"\s*:\s*"([^"]+)"/g;
  const starts: Array<{ index: number; code: string }> = [];
  for (let match = codePattern.exec(text); match; match = codePattern.exec(text)) {
    starts.push({ index: match.index, code: match[1] });
  }

  return starts.map((start, position) => {
    const end = starts[position + 1]?.index ?? text.length;
    const segment = text.slice(start.index, end);
    const entry: Record<string, unknown> = { hs_code: start.code };
    for (const field of SCRAPED_FIELDS) {
      const value = scrapeField(segment, field);
      if (value !== undefined) {
        entry[field] = value;
      }
    }
    return entry;
  });
}

export function parseModelResponse(text: string): ParseOutcome {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return { ok: false, reason: "empty response" };
  }

  const strict = tryParseObject(trimmed);
  if (strict) {
    return { ok: true, strategy: "strict", value: strict };
  }

  const fenced = extractFenced(trimmed);
  if (fenced !== undefined) {
    const value = tryParseObject(fenced);
    if (value) {
      return { ok: true, strategy: "fenced", value };
    }
  }

  const repaired = repair(trimmed);
  if (repaired) {
    return { ok: true, strategy: "repaired", value: repaired };
  }

  const scraped = scrapeClassifications(trimmed);
  if (scraped.length > 0) {
    return { ok: true, strategy: "extracted", value: { classifications: scraped } };
  }

  return { ok: false, reason: "no JSON object found in model response" };
}
