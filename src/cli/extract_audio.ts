#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";

import { CommandRunner, extractAudio, findAllFiles, runCommand } from "../audio";
import { isHelpDisplayed } from "./options";

function buildCommand(): Command {
  const program = new Command();
  program
    .description("Extract WAV audio from MP4 video files using FFmpeg.")
    .requiredOption("-i, --input <dir>", "Folder containing the MP4 files")
    .requiredOption("-o, --output <dir>", "Folder where the audio files will be saved");
  return program;
}

async function main(argv: string[], run: CommandRunner = runCommand): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<{ input: string; output: string }>();
    const videoDir = path.resolve(options.input);
    const audioDir = path.resolve(options.output);
    fs.mkdirSync(audioDir, { recursive: true });

    const videos = findAllFiles(videoDir, ".mp4");
    if (videos.length === 0) {
      console.warn("No MP4 files found in the input folder.");
      return 0;
    }

    console.info("Extracting audio files ...");
    const startedAt = Date.now();
    let failed = 0;

    for (const video of videos) {
      const videoPath = path.join(videoDir, video);
      const audioPath = path.join(audioDir, `${path.parse(video).name}_audio.wav`);
      try {
        await extractAudio(videoPath, audioPath, run);
        console.info(`Successfully extracted audio from '${video}'`);
      } catch (error) {
        failed += 1;
        console.error(
          `Failed to extract audio from '${video}': ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);
    console.info(`Audio extraction finished in ${elapsed}s (${videos.length - failed}/${videos.length} succeeded).`);
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
