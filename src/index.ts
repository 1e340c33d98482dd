export {
  API_KEY_ENV,
  BASE_URL_ENV,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  WhisperClient,
  loadApiKey,
  requireApiKey
} from "./api";

export type { TranscriptionClient, TranscriptionRequest, WhisperClientOptions } from "./api";

export { SubtitleError, WhisperError } from "./errors";

export { LANGUAGE_PRESETS, DEFAULT_LANGUAGE } from "./languages";

export {
  SubtitleConfig,
  DEFAULT_MAX_LINES,
  DEFAULT_MAX_CHARS_PER_LINE,
  DEFAULT_MIN_DURATION,
  DEFAULT_MAX_DURATION,
  DEFAULT_FRAME_INTERVAL,
  DEFAULT_INCLUSIVE_SUFFIX,
  formatTimestamp,
  isSentenceEnd,
  segmentSentences,
  isSplittable,
  splitGroup,
  splitLongGroups,
  insertFrameGaps,
  splitSubtitleText,
  joinText,
  extractWords,
  wordsToSubtitleSegments,
  buildSubtitleEntries,
  renderSegments,
  formatSrt,
  writeSrtFile,
  loadTranscript,
  validateWords,
  srt
} from "./subtitles";

export { parseTranscript } from "./transcript";

export { transcribeAudio, transcribeToFile, generateSubtitles } from "./transcriber";

export { extractAudio, findAllFiles, runCommand } from "./audio";

export type {
  Group,
  LanguagePreset,
  SubtitleConfigOptions,
  SubtitleEntry,
  SuffixRule,
  Transcript,
  TranscriptSegment,
  TranscriptWord,
  Word
} from "./types";
