import fs from "node:fs";
import path from "node:path";

import { SubtitleError } from "./errors";
import { DEFAULT_LANGUAGE, languagePreset } from "./languages";
import { parseTranscript } from "./transcript";
import {
  Group,
  SubtitleConfigOptions,
  SubtitleEntry,
  SuffixRule,
  Transcript,
  Word
} from "./types";

export const DEFAULT_MAX_LINES = 2;
export const DEFAULT_MAX_CHARS_PER_LINE = 40;
export const DEFAULT_MIN_DURATION = 2;
export const DEFAULT_MAX_DURATION = 5;
export const DEFAULT_FRAME_INTERVAL = 0.042;
export const DEFAULT_INCLUSIVE_SUFFIX: SuffixRule = { suffix: "Innen", replacement: "*innen" };

const SPLIT_PUNCTUATION = [...".。,，!！?？:：”)]};"];
const CLOSING_CHARS = /[”"'»›)\]]+$/u;
const TERMINAL_PUNCTUATION = /[.!?]+$/;

export class SubtitleConfig {
  max_lines: number;
  max_chars_per_line: number;
  min_duration: number;
  max_duration: number;
  frame_interval: number;
  language: string;
  abbreviations: Set<string>;
  conjunctions: Set<string>;
  inclusive_suffix: SuffixRule | null;

  constructor(options: SubtitleConfigOptions = {}) {
    this.max_lines = positive("maxLines", options.maxLines ?? DEFAULT_MAX_LINES);
    this.max_chars_per_line = positive(
      "maxCharsPerLine",
      options.maxCharsPerLine ?? DEFAULT_MAX_CHARS_PER_LINE
    );
    this.min_duration = positive("minDuration", options.minDuration ?? DEFAULT_MIN_DURATION);
    this.max_duration = positive("maxDuration", options.maxDuration ?? DEFAULT_MAX_DURATION);
    this.frame_interval = options.frameInterval ?? DEFAULT_FRAME_INTERVAL;
    if (!Number.isFinite(this.frame_interval) || this.frame_interval < 0) {
      throw new SubtitleError(`frameInterval must be a non-negative number, got ${this.frame_interval}.`);
    }

    this.language = options.language ?? DEFAULT_LANGUAGE;
    const preset = languagePreset(this.language);
    if (!preset && (!options.abbreviations || !options.conjunctions)) {
      throw new SubtitleError(`Unknown language "${this.language}".`);
    }
    this.abbreviations = new Set(options.abbreviations ?? preset?.abbreviations ?? []);
    this.conjunctions = new Set(options.conjunctions ?? preset?.conjunctions ?? []);
    this.inclusive_suffix =
      options.inclusiveSuffix === undefined ? DEFAULT_INCLUSIVE_SUFFIX : options.inclusiveSuffix;
  }

  get max_chars(): number {
    return this.max_lines * this.max_chars_per_line;
  }
}

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new SubtitleError(`${name} must be a positive number, got ${value}.`);
  }
  return value;
}

export function formatTimestamp(seconds: number): string {
  // Round to microseconds first so 1.001 does not become 1000.9999… ms.
  const millis = Math.max(0, Math.floor(Math.round(seconds * 1_000_000) / 1000));
  const totalSeconds = Math.floor(millis / 1000);
  const remainderMillis = millis % 1000;
  const secs = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const minutes = totalMinutes % 60;
  const hours = Math.floor(totalMinutes / 60);
  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${secs.toString().padStart(2, "0")},${remainderMillis
    .toString()
    .padStart(3, "0")}`;
}

function groupDuration(group: Group): number {
  return group[group.length - 1].end - group[0].start;
}

function charLength(text: string): number {
  return [...text].length;
}

function numberOfChars(group: Group): number {
  return group.reduce((sum, word) => sum + charLength(word.text), 0);
}

function containsSplitPunctuation(text: string): boolean {
  return SPLIT_PUNCTUATION.some((char) => text.includes(char));
}

export function validateWords(words: readonly Word[]): void {
  if (words.length === 0) {
    throw new SubtitleError("Cannot build subtitles from an empty word sequence.");
  }
  words.forEach((word, index) => {
    if (!Number.isFinite(word.start) || !Number.isFinite(word.end) || word.start < 0) {
      throw new SubtitleError(
        `Word ${index} ("${word.text}") has invalid times ${word.start}–${word.end}.`
      );
    }
    if (word.end < word.start) {
      throw new SubtitleError(
        `Word ${index} ("${word.text}") ends at ${word.end}s before it starts at ${word.start}s.`
      );
    }
  });
}

export function isSentenceEnd(text: string, abbreviations: ReadonlySet<string>): boolean {
  if (abbreviations.has(text)) {
    return false;
  }
  const cleaned = text.trimEnd().replace(CLOSING_CHARS, "");
  return TERMINAL_PUNCTUATION.test(cleaned);
}

export function segmentSentences(
  words: readonly Word[],
  abbreviations: ReadonlySet<string>
): Word[][] {
  const groups: Word[][] = [];
  let current: Word[] = [];
  for (const word of words) {
    current.push(word);
    if (isSentenceEnd(word.text, abbreviations)) {
      groups.push(current);
      current = [];
    }
  }
  // Trailing words without terminal punctuation still form a group.
  if (current.length > 0) {
    groups.push(current);
  }
  return groups;
}

export function isSplittable(group: Group, config: SubtitleConfig): boolean {
  return (
    groupDuration(group) > config.max_duration &&
    numberOfChars(group) > config.max_chars &&
    group.length > 1
  );
}

/**
 * Finds the first point, in word order, where the group may be cut and
 * returns both halves as new arrays. Per word the checks run in a fixed
 * priority: punctuation, following conjunction, character budget, duration
 * budget, too-short remainder, single-word remainder. The last one always
 * fires by the second-to-last word, so the scan cannot run off the end.
 */
export function splitGroup(group: Group, config: SubtitleConfig): [Word[], Word[]] {
  if (group.length < 2) {
    throw new SubtitleError("A group needs at least two words to be split.");
  }

  const firstStart = group[0].start;
  let firstChars = 0;

  for (let i = 0; i < group.length; i += 1) {
    const word = group[i];
    firstChars += charLength(word.text);
    const first = group.slice(0, i + 1);
    const second = group.slice(i + 1);
    const firstDuration = word.end - firstStart;
    const longEnough = firstDuration >= config.min_duration;

    if (containsSplitPunctuation(word.text) && longEnough) {
      return [first, second];
    }
    if (i + 1 < group.length && config.conjunctions.has(group[i + 1].text) && longEnough) {
      return [first, second];
    }
    if (firstChars >= config.max_chars && longEnough) {
      return [first, second];
    }
    if (firstDuration >= config.max_duration) {
      return [first, second];
    }
    if (second.length > 1 && groupDuration(second) <= config.min_duration) {
      return [first, second];
    }
    if (second.length === 1) {
      return [first, second];
    }
  }

  throw new SubtitleError("No split point found.");
}

export function splitLongGroups(groups: readonly Group[], config: SubtitleConfig): Word[][] {
  const out: Word[][] = [];
  for (const sentence of groups) {
    let rest: Word[] = [...sentence];
    while (isSplittable(rest, config)) {
      const [first, second] = splitGroup(rest, config);
      out.push(first);
      rest = second;
    }
    out.push(rest);
  }
  return out;
}

/**
 * Moves the start of a group forward by one frame when it starts exactly where
 * the previous group ends. Only exact equality counts.
 */
export function insertFrameGaps(groups: readonly Group[], frameInterval: number): Word[][] {
  return groups.map((group, index) => {
    if (index === 0 || group.length === 0) {
      return [...group];
    }
    const previous = groups[index - 1];
    const head = group[0];
    if (previous.length === 0 || previous[previous.length - 1].end !== head.start) {
      return [...group];
    }
    const groupEnd = group[group.length - 1].end;
    return [
      { ...head, start: Math.min(head.start + frameInterval, groupEnd) },
      ...group.slice(1)
    ];
  });
}

export function splitSubtitleText(text: string, maxCharsPerLine: number): string {
  const chars = [...text];
  if (chars.length <= maxCharsPerLine) {
    return text;
  }

  const middle = Math.floor(chars.length / 2);
  const firstPart = chars.slice(0, middle).join("");
  const secondPart = chars.slice(middle).join("");

  // The word running across the midpoint is stitched back together and
  // placed on one of the two lines.
  const firstSpace = secondPart.indexOf(" ");
  const secondBeforeSpace = firstSpace === -1 ? secondPart : secondPart.slice(0, firstSpace);
  const secondAfterSpace = firstSpace === -1 ? "" : secondPart.slice(firstSpace + 1);

  const lastSpace = firstPart.lastIndexOf(" ");
  const firstBeforeSpace = lastSpace === -1 ? "" : firstPart.slice(0, lastSpace);
  const firstAfterSpace = lastSpace === -1 ? firstPart : firstPart.slice(lastSpace + 1);

  const middleWord = firstAfterSpace + secondBeforeSpace;

  let firstLine: string;
  let secondLine: string;
  if (
    charLength(firstBeforeSpace) < charLength(secondAfterSpace) ||
    containsSplitPunctuation(middleWord)
  ) {
    firstLine = `${firstBeforeSpace} ${middleWord}`;
    secondLine = secondAfterSpace;
  } else {
    firstLine = firstBeforeSpace;
    secondLine = `${middleWord} ${secondAfterSpace}`;
  }

  // A blank line would end the SRT entry early.
  if (firstLine.trim().length === 0 || secondLine.trim().length === 0) {
    return text;
  }
  return `${firstLine}\n${secondLine}`;
}

export function applySuffixRule(text: string, rule: SuffixRule | null): string {
  if (!rule || !text.endsWith(rule.suffix)) {
    return text;
  }
  return text.slice(0, text.length - rule.suffix.length) + rule.replacement;
}

/**
 * Wraps the words as the recognizer spaced them, leading blank included, and
 * only then trims each line.
 */
export function joinText(group: Group, config: SubtitleConfig): string {
  const text = group.map((word) => applySuffixRule(word.text, config.inclusive_suffix)).join("");
  return splitSubtitleText(text, config.max_chars_per_line)
    .split("\n")
    .map((line) => line.trim())
    .join("\n");
}

export function extractWords(transcript: Transcript): Word[] {
  const fromSegments = (transcript.segments ?? []).flatMap((segment) => segment.words ?? []);
  const source = fromSegments.length > 0 ? fromSegments : transcript.words ?? [];
  if (source.length === 0) {
    throw new SubtitleError("No words found in transcript.");
  }
  return source.map((word) => ({ text: word.word, start: word.start, end: word.end }));
}

export function wordsToSubtitleSegments(words: readonly Word[], config: SubtitleConfig): Word[][] {
  validateWords(words);
  const sentences = segmentSentences(words, config.abbreviations);
  const segments = splitLongGroups(sentences, config);
  return insertFrameGaps(segments, config.frame_interval);
}

export function renderSegments(segments: readonly Group[], config: SubtitleConfig): SubtitleEntry[] {
  return segments.map((segment, index) => ({
    index: index + 1,
    start: segment[0].start,
    end: segment[segment.length - 1].end,
    lines: joinText(segment, config).split("\n")
  }));
}

export function buildSubtitleEntries(
  words: readonly Word[],
  config: SubtitleConfig = new SubtitleConfig()
): SubtitleEntry[] {
  return renderSegments(wordsToSubtitleSegments(words, config), config);
}

export function formatSrt(entries: readonly SubtitleEntry[]): string {
  return entries
    .map((entry) =>
      [
        `${entry.index}`,
        `${formatTimestamp(entry.start)} --> ${formatTimestamp(entry.end)}`,
        ...entry.lines
      ].join("\n")
    )
    .join("\n\n");
}

export function writeSrtFile(entries: readonly SubtitleEntry[], outputPath: string): void {
  const resolved = path.resolve(outputPath);
  fs.writeFileSync(resolved, formatSrt(entries), { encoding: "utf-8" });
}

export function loadTranscript(transcriptPath: string): Transcript {
  const resolved = path.resolve(transcriptPath);
  console.info(`Loading transcript from ${resolved}`);
  const raw = fs.readFileSync(resolved, "utf-8");
  const data: unknown = JSON.parse(raw);
  return parseTranscript(data);
}

export function srt(
  transcript: Transcript | string,
  outputPath = "subtitles.srt",
  config: SubtitleConfig = new SubtitleConfig()
): string {
  const data = typeof transcript === "string" ? loadTranscript(transcript) : transcript;

  const words = extractWords(data);
  const entries = buildSubtitleEntries(words, config);
  const resolvedOutput = path.resolve(outputPath);
  console.info(`Writing ${entries.length} subtitles to ${resolvedOutput}`);
  writeSrtFile(entries, resolvedOutput);
  return resolvedOutput;
}
