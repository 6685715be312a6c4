import fs from "node:fs";
import { z } from "zod";
import {
  MAX_TIMELINE_SECTIONS,
  MIN_SUMMARY_INPUT,
  SUMMARY_PLACEHOLDERS,
} from "../constants.js";
import type { CuratorSummary, ParagraphSummary, TimelineSection } from "../types.js";
import {
  joinSentences,
  longestInOrder,
  segmentParagraphs,
  splitSentences,
  toCasual,
  topKeywords,
  truncateWords,
  wordSet,
} from "./text.js";

const SHORT_PARAGRAPH = 30;
const MIN_PARAGRAPH_SUMMARY = 6;

const CURATOR_MIN_SENTENCE = 10;
const TITLE_MAX_CHARS = 100;
const TITLE_MAX_WORDS = 10;
const KEY_POINTS = 3;
const MAX_SHARED_WORDS = 0.5;

const TIMELINE_MIN_SENTENCE = 15;
const GROUP_MAX_SENTENCES = 4;
const GROUP_MAX_CHARS = 300;
const SUBTITLE_MAX_CHARS = 60;
const SUBTITLE_MAX_WORDS = 8;
const MINUTES_PER_SECTION = 3;

const STOPWORDS_URL = new URL("../../data/stopwords.json", import.meta.url);

export function loadStopWords(): Set<string> {
  const raw: unknown = JSON.parse(fs.readFileSync(STOPWORDS_URL, "utf-8"));
  return new Set(z.array(z.string()).parse(raw));
}

/**
 * Deterministic summaries. Never consults a model, so it is the tier that
 * must produce something for every input.
 */
export class RuleBasedSummarizer {
  readonly name = "rule-based";

  constructor(private readonly stopWords: ReadonlySet<string> = loadStopWords()) {}

  keySummary(text: string): ParagraphSummary[] {
    if (text.trim().length < MIN_SUMMARY_INPUT) {
      return [{ paragraph_summary: SUMMARY_PLACEHOLDERS.PARAGRAPH }];
    }
    const summaries = segmentParagraphs(text)
      .map(summarizeParagraph)
      .filter((s) => s.length >= MIN_PARAGRAPH_SUMMARY)
      .map((paragraph_summary) => ({ paragraph_summary }));

    return summaries.length > 0
      ? summaries
      : [{ paragraph_summary: SUMMARY_PLACEHOLDERS.PARAGRAPH }];
  }

  curate(text: string): CuratorSummary {
    const sentences =
      text.trim().length < MIN_SUMMARY_INPUT ? [] : splitSentences(text, CURATOR_MIN_SENTENCE);
    if (sentences.length === 0) {
      return {
        title: SUMMARY_PLACEHOLDERS.TITLE,
        one_line_summary: SUMMARY_PLACEHOLDERS.PARAGRAPH,
        key_points: [SUMMARY_PLACEHOLDERS.KEY_POINT],
      };
    }

    return {
      title: truncateWords(sentences[0], TITLE_MAX_CHARS, TITLE_MAX_WORDS),
      one_line_summary: joinSentences(longestInOrder(sentences.slice(0, 5), 2)),
      key_points: pickKeyPoints(sentences),
    };
  }

  timeline(text: string): TimelineSection[] {
    return this.timelineGroups(text).map((group, i) => this.timelineSection(group, i));
  }

  /** Sentence groups backing each timeline section, already capped. */
  timelineGroups(text: string): string[][] {
    if (text.trim().length < MIN_SUMMARY_INPUT) return [];

    let sentences = splitSentences(text, TIMELINE_MIN_SENTENCE);
    if (sentences.length === 0) {
      const whole = text.replace(/\s+/g, " ").trim();
      sentences = whole.length > TIMELINE_MIN_SENTENCE ? [whole] : [];
    }

    const groups: string[][] = [];
    let current: string[] = [];
    let chars = 0;
    for (const sentence of sentences) {
      if (
        current.length > 0 &&
        (current.length >= GROUP_MAX_SENTENCES || chars + sentence.length > GROUP_MAX_CHARS)
      ) {
        groups.push(current);
        current = [];
        chars = 0;
      }
      current.push(sentence);
      chars += sentence.length;
    }
    if (current.length > 0) groups.push(current);

    return groups.slice(0, MAX_TIMELINE_SECTIONS);
  }

  timelineSection(group: string[], index: number): TimelineSection {
    const start = MINUTES_PER_SECTION * index + 1;
    const end = MINUTES_PER_SECTION * (index + 1);
    return {
      timestamp: `${start}-${end}분`,
      subtitle: truncateWords(group[0], SUBTITLE_MAX_CHARS, SUBTITLE_MAX_WORDS),
      summary: joinSentences(longestInOrder(group.slice(0, GROUP_MAX_SENTENCES), 2)),
      keywords: topKeywords(group.join(" "), this.stopWords),
      oneline_summary: toCasual(group[0]),
    };
  }
}

function summarizeParagraph(paragraph: string): string {
  if (paragraph.length < SHORT_PARAGRAPH) return paragraph;
  const sentences = splitSentences(paragraph);
  if (sentences.length <= 2) return paragraph;

  const [first, ...rest] = sentences;
  const [longest] = longestInOrder(rest, 1);
  return joinSentences([first, longest]);
}

// Longest first, skipping any candidate that mostly repeats a chosen point
function pickKeyPoints(sentences: string[]): string[] {
  if (sentences.length < KEY_POINTS) return [...sentences];

  const chosen: { sentence: string; words: Set<string> }[] = [];
  const byLength = [...sentences].sort((a, b) => b.length - a.length);
  for (const candidate of byLength) {
    if (chosen.length >= KEY_POINTS) break;
    const candidateWords = wordSet(candidate);
    const limit = candidateWords.size * MAX_SHARED_WORDS;
    const repeats = chosen.some(({ words }) => {
      let shared = 0;
      for (const w of candidateWords) if (words.has(w)) shared += 1;
      return shared > limit;
    });
    if (!repeats) chosen.push({ sentence: candidate, words: candidateWords });
  }
  return chosen.map(({ sentence }) => sentence);
}
