#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";

import { BASE_URL_ENV, DEFAULT_BASE_URL, DEFAULT_MODEL, TranscriptionClient } from "../api";
import { findAllFiles } from "../audio";
import { generateSubtitles } from "../transcriber";
import {
  SubtitleCliOptions,
  addSubtitleOptions,
  configFromOptions,
  isHelpDisplayed
} from "./options";

type GenerateCliOptions = SubtitleCliOptions & {
  audio: string;
  output: string;
  model: string;
  language?: string;
  baseUrl: string;
};

function buildCommand(): Command {
  const program = new Command();
  program
    .description("Generate subtitles (.srt) from audio files using a Whisper endpoint.")
    .requiredOption(
      "--audio <path>",
      "Path to an audio file (.wav) or a folder containing multiple audio files"
    )
    .option("--output <dir>", "Output folder where subtitles (.srt) will be saved", "subtitles")
    .option("--model <name>", "Whisper model to request", DEFAULT_MODEL)
    .option("--language <code>", "Spoken language hint passed to the recognizer")
    .option(
      "--base-url <url>",
      "Base URL of the transcription endpoint",
      process.env[BASE_URL_ENV] ?? DEFAULT_BASE_URL
    );
  return addSubtitleOptions(program);
}

function srtPathFor(audioFile: string, outputDir: string): string {
  return path.join(outputDir, `${path.parse(audioFile).name}.srt`);
}

async function main(argv: string[], client?: TranscriptionClient): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<GenerateCliOptions>();
    const config = configFromOptions(options);
    const audioPath = path.resolve(options.audio);
    const outputDir = path.resolve(options.output);

    console.info(`Input path:  ${audioPath}`);
    console.info(`Output path: ${outputDir}`);
    console.info(`Model:       ${options.model}`);

    let audioFiles: string[];
    if (fs.existsSync(audioPath) && fs.statSync(audioPath).isFile()) {
      audioFiles = [audioPath];
    } else if (fs.existsSync(audioPath) && fs.statSync(audioPath).isDirectory()) {
      audioFiles = findAllFiles(audioPath, ".wav").map((name) => path.join(audioPath, name));
      if (audioFiles.length === 0) {
        console.warn("No .wav files found in this folder.");
        return 0;
      }
      console.info(`Found ${audioFiles.length} file(s):`);
      for (const file of audioFiles) {
        console.info(`  - ${path.basename(file)}`);
      }
    } else {
      console.error("Invalid input path. Please provide a valid file or folder.");
      return 1;
    }

    fs.mkdirSync(outputDir, { recursive: true });
    const startedAt = Date.now();

    for (const [index, audioFile] of audioFiles.entries()) {
      console.info(`[${index + 1}/${audioFiles.length}] Processing: ${path.basename(audioFile)}`);
      const written = await generateSubtitles({
        audioPath: audioFile,
        srtPath: srtPathFor(audioFile, outputDir),
        config,
        model: options.model,
        language: options.language,
        baseUrl: options.baseUrl,
        client
      });
      console.info(`  -> Saved to ${written}`);
    }

    const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);
    console.info(`Subtitle generation completed in ${elapsed}s.`);
    console.info(`Subtitles saved in: ${outputDir}`);
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
