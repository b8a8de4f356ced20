const cleanJson = (text: string) => text.replace(/```json/g, '').replace(/```/g, '').trim();

const tryParse = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

// First balanced {...} block, skipping braces inside strings.
const extractObject = (raw: string) => {
  const start = raw.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < raw.length; i++) {
    const char = raw[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return raw.slice(start, i + 1);
    }
  }
  return null;
};

/** Parses model output that may be fenced or wrapped in prose. Returns undefined when nothing parses. */
export const parseJsonLenient = (text: string): unknown => {
  const attempts = [text.trim(), cleanJson(text), extractObject(text)];
  for (const attempt of attempts) {
    if (!attempt) continue;
    const parsed = tryParse(attempt);
    if (parsed !== undefined) return parsed;
  }
  return undefined;
};
