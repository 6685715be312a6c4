// Text helpers shared by the summarization tiers.

const BLANK_LINE = /\n\s*\n/;
const MIN_LINE_FRAGMENT = 10;

/** Period-delimited sentences, whitespace collapsed, longer than `minLength`. */
export function splitSentences(text: string, minLength = 0): string[] {
  return text
    .split(".")
    .map((s) => s.replace(/\s+/g, " ").trim())
    .filter((s) => s.length > minLength);
}

/**
 * Paragraph units: blank-line separated blocks, or single lines of at least
 * 10 characters when the text has no blank-line breaks.
 */
export function segmentParagraphs(text: string): string[] {
  const blocks = text
    .split(BLANK_LINE)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  if (blocks.length > 1) return blocks;

  return text
    .split("\n")
    .map((p) => p.trim())
    .filter((p) => p.length >= MIN_LINE_FRAGMENT);
}

export function truncateWords(sentence: string, maxChars: number, maxWords: number): string {
  if (sentence.length <= maxChars) return sentence;
  return `${sentence.split(" ").slice(0, maxWords).join(" ")}...`;
}

/** The `count` longest sentences (earliest wins ties), in their original order. */
export function longestInOrder(sentences: string[], count: number): string[] {
  return sentences
    .map((s, idx) => ({ s, idx }))
    .sort((a, b) => b.s.length - a.s.length || a.idx - b.idx)
    .slice(0, count)
    .sort((a, b) => a.idx - b.idx)
    .map(({ s }) => s);
}

export function joinSentences(parts: string[]): string {
  return parts.map((p) => `${p}.`).join(" ");
}

export function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
}

export function words(text: string): string[] {
  return text
    .split(/\s+/)
    .map(normalizeWord)
    .filter((w) => w.length > 0);
}

export function wordSet(text: string): Set<string> {
  return new Set(words(text));
}

/** Up to `limit` words seen more than once, most frequent first. */
export function topKeywords(text: string, stopWords: ReadonlySet<string>, limit = 4): string[] {
  const counts = new Map<string, number>();
  for (const w of words(text)) {
    if (w.length <= 1 || stopWords.has(w)) continue;
    counts.set(w, (counts.get(w) ?? 0) + 1);
  }
  return [...counts.entries()]
    .filter(([, n]) => n > 1)
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([w]) => w);
}

// Formal (합쇼체) endings and their casual (해요체) counterparts; longest match first.
const CASUAL_ENDINGS: ReadonlyArray<readonly [string, string]> = [
  ["하겠습니다", "할게요"],
  ["했습니다", "했어요"],
  ["있습니다", "있어요"],
  ["없습니다", "없어요"],
  ["됩니다", "돼요"],
  ["합니다", "해요"],
  ["입니다", "이에요"],
  ["습니다", "어요"],
];

const GENERIC_SUFFIX = " 라는 내용이에요.";

export function toCasual(sentence: string): string {
  const base = sentence.replace(/[.!?\s]+$/u, "");
  for (const [formal, casual] of CASUAL_ENDINGS) {
    if (base.endsWith(formal)) {
      return `${base.slice(0, base.length - formal.length)}${casual}.`;
    }
  }
  return `${base}${GENERIC_SUFFIX}`;
}
