#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";

import { srt } from "../subtitles";
import {
  SubtitleCliOptions,
  addSubtitleOptions,
  configFromOptions,
  isHelpDisplayed
} from "./options";

type ToSrtCliOptions = SubtitleCliOptions & {
  input: string;
  output: string;
};

function buildCommand(): Command {
  const program = new Command();
  program
    .description("Convert a word-timestamped Whisper transcript JSON into an SRT subtitle file.")
    .option("--input <path>", "Path to the verbose JSON transcript", "transcript.json")
    .option("--output <path>", "Path for the generated SRT file", "subtitles.srt");
  return addSubtitleOptions(program);
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<ToSrtCliOptions>();

    const inputPath = path.resolve(options.input);
    if (!fs.existsSync(inputPath)) {
      throw new Error(`Input file not found: ${inputPath}`);
    }

    const written = srt(inputPath, options.output, configFromOptions(options));
    console.info(`Wrote subtitles to ${written}`);
    return 0;
  } catch (error) {
    if (isHelpDisplayed(error)) {
      return 0;
    }
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv).then(
    (code) => process.exit(code),
    (error) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  );
}

export default main;
