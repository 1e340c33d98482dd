import { SubtitleError } from "./errors";
import { Transcript, TranscriptSegment, TranscriptWord } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(obj: Record<string, unknown>, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SubtitleError(`Invalid transcript: ${where}.${key} must be a finite number.`);
  }
  return value;
}

function readString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new SubtitleError(`Invalid transcript: ${where}.${key} must be a string.`);
  }
  return value;
}

function optional<T>(
  obj: Record<string, unknown>,
  key: string,
  read: (obj: Record<string, unknown>, key: string, where: string) => T,
  where: string
): T | undefined {
  return obj[key] === undefined || obj[key] === null ? undefined : read(obj, key, where);
}

function parseWords(value: unknown, where: string): TranscriptWord[] {
  if (!Array.isArray(value)) {
    throw new SubtitleError(`Invalid transcript: ${where} must be an array.`);
  }
  return value.map((item, index) => {
    const at = `${where}[${index}]`;
    if (!isRecord(item)) {
      throw new SubtitleError(`Invalid transcript: ${at} must be an object.`);
    }
    const word: TranscriptWord = {
      word: readString(item, "word", at),
      start: readNumber(item, "start", at),
      end: readNumber(item, "end", at)
    };
    const probability = optional(item, "probability", readNumber, at);
    if (probability !== undefined) {
      word.probability = probability;
    }
    return word;
  });
}

function parseSegments(value: unknown): TranscriptSegment[] {
  if (!Array.isArray(value)) {
    throw new SubtitleError("Invalid transcript: segments must be an array.");
  }
  return value.map((item, index) => {
    const at = `segments[${index}]`;
    if (!isRecord(item)) {
      throw new SubtitleError(`Invalid transcript: ${at} must be an object.`);
    }
    const segment: TranscriptSegment = {
      start: readNumber(item, "start", at),
      end: readNumber(item, "end", at),
      text: optional(item, "text", readString, at) ?? ""
    };
    const id = optional(item, "id", readNumber, at);
    if (id !== undefined) {
      segment.id = id;
    }
    if (item.words !== undefined && item.words !== null) {
      segment.words = parseWords(item.words, `${at}.words`);
    }
    return segment;
  });
}

/**
 * Validates a verbose-JSON transcription response (already parsed from JSON)
 * and returns it typed. Unknown fields are dropped.
 */
export function parseTranscript(value: unknown): Transcript {
  if (!isRecord(value)) {
    throw new SubtitleError("Invalid transcript: expected a JSON object.");
  }
  const transcript: Transcript = {};
  const text = optional(value, "text", readString, "transcript");
  if (text !== undefined) {
    transcript.text = text;
  }
  const language = optional(value, "language", readString, "transcript");
  if (language !== undefined) {
    transcript.language = language;
  }
  const duration = optional(value, "duration", readNumber, "transcript");
  if (duration !== undefined) {
    transcript.duration = duration;
  }
  if (value.segments !== undefined && value.segments !== null) {
    transcript.segments = parseSegments(value.segments);
  }
  if (value.words !== undefined && value.words !== null) {
    transcript.words = parseWords(value.words, "words");
  }
  return transcript;
}
