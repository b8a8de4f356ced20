export const singularize = (value: string) => {
  if (value.endsWith('ies') && value.length > 3) return `${value.slice(0, -3)}y`;
  if (/(ss|us|x|z|ch|sh)es$/.test(value)) return value.slice(0, -2);
  return value.endsWith('s') ? value.slice(0, -1) : value;
};

export const pluralize = (value: string) => {
  if (/[^aeiou]y$/.test(value)) return `${value.slice(0, -1)}ies`;
  if (/(s|x|z|ch|sh)$/.test(value)) return `${value}es`;
  return `${value}s`;
};

const tokens = (value: string) => new Set(value.toLowerCase().split('_').filter(Boolean));

/** Intersection over union of the underscore-delimited tokens. */
export const tokenSimilarity = (a: string, b: string) => {
  const ta = tokens(a);
  const tb = tokens(b);
  if (!ta.size || !tb.size) return 0;
  let intersection = 0;
  ta.forEach(t => {
    if (tb.has(t)) intersection++;
  });
  const union = ta.size + tb.size - intersection;
  return union ? intersection / union : 0;
};

export const cosineSimilarity = (a: readonly number[], b: readonly number[]) => {
  if (a.length !== b.length) throw new Error(`Vector length mismatch (${a.length} vs ${b.length})`);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (!na || !nb) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
};

export const clamp01 = (value: number) => Math.min(1, Math.max(0, value));
