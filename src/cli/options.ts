import { Command, CommanderError } from "commander";

import {
  DEFAULT_FRAME_INTERVAL,
  DEFAULT_MAX_CHARS_PER_LINE,
  DEFAULT_MAX_DURATION,
  DEFAULT_MAX_LINES,
  DEFAULT_MIN_DURATION,
  SubtitleConfig
} from "../subtitles";
import { DEFAULT_LANGUAGE } from "../languages";

export type SubtitleCliOptions = {
  maxLines: number;
  maxCharsLine: number;
  minDuration: number;
  maxDuration: number;
  frameInterval: number;
  locale: string;
  inclusiveSuffix: boolean;
};

export function addSubtitleOptions(program: Command): Command {
  return program
    .option(
      "--max-lines <value>",
      "Maximum number of lines per subtitle",
      (value) => parseInt(value, 10),
      DEFAULT_MAX_LINES
    )
    .option(
      "--max-chars-line <value>",
      "Maximum characters per subtitle line",
      (value) => parseInt(value, 10),
      DEFAULT_MAX_CHARS_PER_LINE
    )
    .option(
      "--min-duration <seconds>",
      "Minimum subtitle duration in seconds",
      (value) => parseFloat(value),
      DEFAULT_MIN_DURATION
    )
    .option(
      "--max-duration <seconds>",
      "Maximum subtitle duration in seconds",
      (value) => parseFloat(value),
      DEFAULT_MAX_DURATION
    )
    .option(
      "--frame-interval <seconds>",
      "Gap inserted between subtitles that would otherwise touch",
      (value) => parseFloat(value),
      DEFAULT_FRAME_INTERVAL
    )
    .option(
      "--locale <code>",
      "Language whose abbreviations and conjunctions guide segmentation (de, en)",
      DEFAULT_LANGUAGE
    )
    .option("--no-inclusive-suffix", "Keep words ending in 'Innen' as recognized.");
}

export function configFromOptions(options: SubtitleCliOptions): SubtitleConfig {
  return new SubtitleConfig({
    maxLines: options.maxLines,
    maxCharsPerLine: options.maxCharsLine,
    minDuration: options.minDuration,
    maxDuration: options.maxDuration,
    frameInterval: options.frameInterval,
    language: options.locale,
    inclusiveSuffix: options.inclusiveSuffix ? undefined : null
  });
}

export function isHelpDisplayed(error: unknown): boolean {
  return error instanceof CommanderError && error.code === "commander.helpDisplayed";
}
