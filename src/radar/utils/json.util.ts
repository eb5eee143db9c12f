export function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

export function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/** Parses a JSON object out of model output, tolerating code fences, prose around it and trailing commas. */
export function parseJsonObject(text: string): Record<string, unknown> | null {
  if (!text) {
    return null;
  }
  const trimmed = text
    .trim()
    .replace(/```json/gi, '')
    .replace(/```/g, '')
    .trim();

  const direct = tryJsonParse(trimmed);
  if (direct) {
    return direct;
  }

  const block = extractJsonBlock(trimmed);
  if (!block) {
    return null;
  }

  return tryJsonParse(block) ?? tryJsonParse(stripTrailingCommas(block));
}

function tryJsonParse(value: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(value);
    return asRecord(parsed);
  } catch {
    return null;
  }
}

function extractJsonBlock(value: string): string | null {
  const start = value.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  for (let i = start; i < value.length; i += 1) {
    const ch = value[i];
    if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return value.slice(start, i + 1);
      }
    }
  }
  return null;
}

function stripTrailingCommas(value: string): string {
  return value.replace(/,\s*([}\]])/g, '$1');
}
