import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { TranscriptionClient, TranscriptionRequest } from "../src/api";
import { CommandResult } from "../src/audio";
import extractMain from "../src/cli/extract_audio";
import generateMain from "../src/cli/generate";
import toSrtMain from "../src/cli/to_srt";
import { loadTranscript } from "../src/subtitles";
import { Transcript } from "../src/types";

const samplesDir = path.resolve(__dirname, "..", "samples");
const transcriptPath = path.join(samplesDir, "transcript.json");
const expectedSrt = fs.readFileSync(path.join(samplesDir, "transcript.srt"), "utf-8");

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "whisper-srt-"));
}

class FakeClient implements TranscriptionClient {
  requests: Array<{ audioPath: string; request: TranscriptionRequest }> = [];

  constructor(private readonly fail = false) {}

  async transcribe(audioPath: string, request: TranscriptionRequest): Promise<Transcript> {
    this.requests.push({ audioPath, request });
    if (this.fail) {
      throw new Error("recognizer unavailable");
    }
    return loadTranscript(transcriptPath);
  }

  close(): void {}
}

describe("to_srt CLI", () => {
  it("converts JSON to SRT", async () => {
    const output = path.join(tmpDir(), "subtitles.srt");
    const exitCode = await toSrtMain(["node", "to_srt", "--input", transcriptPath, "--output", output]);

    expect(exitCode).toBe(0);
    expect(fs.readFileSync(output, "utf-8")).toBe(expectedSrt);
  });

  it("passes subtitle options through", async () => {
    const output = path.join(tmpDir(), "narrow.srt");
    const exitCode = await toSrtMain([
      "node",
      "to_srt",
      "--input",
      transcriptPath,
      "--output",
      output,
      "--max-chars-line",
      "30",
      "--no-inclusive-suffix"
    ]);

    expect(exitCode).toBe(0);
    const lines = fs.readFileSync(output, "utf-8").split("\n");
    expect(lines.slice(4, 8)).toEqual(["2", "00:00:01,600 --> 00:00:03,800", "Heute sprechen wir", "über Untertitel, z.B."]);
    expect(lines).toContain("Viele TeilnehmerInnen");
  });

  it("fails when the input is missing", async () => {
    const exitCode = await toSrtMain(["node", "to_srt", "--input", path.join(tmpDir(), "missing.json")]);
    expect(exitCode).toBe(1);
  });

  it("fails on invalid limits", async () => {
    const output = path.join(tmpDir(), "bad.srt");
    const exitCode = await toSrtMain(["node", "to_srt", "--input", transcriptPath, "--output", output, "--max-lines", "0"]);
    expect(exitCode).toBe(1);
    expect(fs.existsSync(output)).toBe(false);
  });
});

describe("generate CLI", () => {
  it("writes one srt for a single audio file", async () => {
    const dir = tmpDir();
    const audioPath = path.join(dir, "lecture.wav");
    fs.writeFileSync(audioPath, "RIFF");
    const outputDir = path.join(dir, "out");
    const client = new FakeClient();

    const exitCode = await generateMain(
      ["node", "generate", "--audio", audioPath, "--output", outputDir, "--model", "test-model", "--language", "de"],
      client
    );

    expect(exitCode).toBe(0);
    expect(fs.readFileSync(path.join(outputDir, "lecture.srt"), "utf-8")).toBe(expectedSrt);
    expect(client.requests).toEqual([
      { audioPath, request: { model: "test-model", language: "de", prompt: undefined } }
    ]);
  });

  it("processes every wav file of a folder", async () => {
    const dir = tmpDir();
    for (const name of ["one.wav", "two.WAV", "skip.mp3"]) {
      fs.writeFileSync(path.join(dir, name), "RIFF");
    }
    const outputDir = path.join(dir, "out");
    const client = new FakeClient();

    const exitCode = await generateMain(["node", "generate", "--audio", dir, "--output", outputDir], client);

    expect(exitCode).toBe(0);
    expect(fs.readdirSync(outputDir).sort()).toEqual(["one.srt", "two.srt"]);
    expect(client.requests.map((entry) => path.basename(entry.audioPath))).toEqual(["one.wav", "two.WAV"]);
  });

  it("returns early when a folder has no wav files", async () => {
    const dir = tmpDir();
    fs.writeFileSync(path.join(dir, "clip.mp3"), "ID3");
    const outputDir = path.join(dir, "out");
    const client = new FakeClient();

    const exitCode = await generateMain(["node", "generate", "--audio", dir, "--output", outputDir], client);

    expect(exitCode).toBe(0);
    expect(fs.existsSync(outputDir)).toBe(false);
    expect(client.requests).toHaveLength(0);
  });

  it("fails for an invalid input path", async () => {
    const exitCode = await generateMain(
      ["node", "generate", "--audio", path.join(tmpDir(), "nowhere")],
      new FakeClient()
    );
    expect(exitCode).toBe(1);
  });

  it("fails when the recognizer fails", async () => {
    const dir = tmpDir();
    const audioPath = path.join(dir, "lecture.wav");
    fs.writeFileSync(audioPath, "RIFF");

    const exitCode = await generateMain(
      ["node", "generate", "--audio", audioPath, "--output", path.join(dir, "out")],
      new FakeClient(true)
    );
    expect(exitCode).toBe(1);
  });
});

describe("extract_audio CLI", () => {
  it("extracts every mp4 and keeps going after a failure", async () => {
    const dir = tmpDir();
    const videoDir = path.join(dir, "videos");
    const audioDir = path.join(dir, "audio");
    fs.mkdirSync(videoDir);
    for (const name of ["a.mp4", "B.MP4", "notes.txt"]) {
      fs.writeFileSync(path.join(videoDir, name), "");
    }

    const targets: string[] = [];
    const run = async (_command: string, args: string[]): Promise<CommandResult> => {
      targets.push(path.basename(args[args.length - 1]));
      if (targets.length === 1) {
        throw new Error("Command failed (1): ffmpeg");
      }
      return { stdout: "", stderr: "" };
    };

    const exitCode = await extractMain(["node", "extract_audio", "-i", videoDir, "-o", audioDir], run);

    expect(exitCode).toBe(0);
    expect(targets).toEqual(["B_audio.wav", "a_audio.wav"]);
    expect(fs.existsSync(audioDir)).toBe(true);
  });

  it("returns early without mp4 files", async () => {
    const dir = tmpDir();
    const calls: string[] = [];
    const run = async (command: string): Promise<CommandResult> => {
      calls.push(command);
      return { stdout: "", stderr: "" };
    };

    const exitCode = await extractMain(["node", "extract_audio", "-i", dir, "-o", path.join(dir, "audio")], run);

    expect(exitCode).toBe(0);
    expect(calls).toHaveLength(0);
  });
});
