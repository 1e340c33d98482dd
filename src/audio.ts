import { spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "pipe" });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      reject(error);
    });

    child.on("close", (code) => {
      if (code !== 0) {
        const suffix = stderr.trim() ? `\n${stderr.trim()}` : "";
        reject(new Error(`Command failed (${code}): ${command}${suffix}`));
        return;
      }
      resolve({ stdout, stderr });
    });
  });

/** File names in `folderPath` ending with `ending`, compared case-insensitively. */
export function findAllFiles(folderPath: string, ending = ".wav"): string[] {
  if (!fs.existsSync(folderPath)) {
    console.warn(`The folder '${folderPath}' does not exist.`);
    return [];
  }
  const suffix = ending.toLowerCase();
  return fs
    .readdirSync(folderPath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(suffix))
    .map((entry) => entry.name)
    .sort();
}

/** Writes the audio track of a video as stereo 32-bit PCM WAV, overwriting the target. */
export async function extractAudio(
  videoPath: string,
  audioPath: string,
  run: CommandRunner = runCommand
): Promise<void> {
  await run("ffmpeg", [
    "-i",
    path.resolve(videoPath),
    "-acodec",
    "pcm_s32le",
    "-ac",
    "2",
    "-y",
    path.resolve(audioPath)
  ]);
}
