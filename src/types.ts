export interface Word {
  /** Recognized text, usually with the leading space the recognizer emits. */
  readonly text: string;
  /** Seconds from the start of the audio. */
  readonly start: number;
  readonly end: number;
}

export type Group = readonly Word[];

export interface TranscriptWord {
  word: string;
  start: number;
  end: number;
  probability?: number;
}

export interface TranscriptSegment {
  id?: number;
  start: number;
  end: number;
  text: string;
  words?: TranscriptWord[];
}

export interface Transcript {
  text?: string;
  language?: string;
  duration?: number;
  segments?: TranscriptSegment[];
  words?: TranscriptWord[];
}

export interface SubtitleEntry {
  index: number;
  start: number;
  end: number;
  lines: string[];
}

export interface SuffixRule {
  suffix: string;
  replacement: string;
}

export interface LanguagePreset {
  abbreviations: string[];
  conjunctions: string[];
}

export interface SubtitleConfigOptions {
  maxLines?: number;
  maxCharsPerLine?: number;
  minDuration?: number;
  maxDuration?: number;
  frameInterval?: number;
  language?: string;
  abbreviations?: string[];
  conjunctions?: string[];
  inclusiveSuffix?: SuffixRule | null;
}
