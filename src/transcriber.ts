import fs from "node:fs";
import path from "node:path";

import {
  API_KEY_ENV,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  TranscriptionClient,
  WhisperClient,
  loadApiKey
} from "./api";
import { SubtitleConfig, srt } from "./subtitles";
import { Transcript } from "./types";

export interface TranscribeOptions {
  audioPath: string;
  model?: string;
  language?: string;
  prompt?: string;
  temperature?: number;
  client?: TranscriptionClient;
  baseUrl?: string;
  searchEnvPaths?: string[];
}

export interface GenerateSubtitlesOptions extends TranscribeOptions {
  srtPath: string;
  config?: SubtitleConfig;
}

function ensureClient(
  maybeClient: TranscriptionClient | undefined,
  baseUrl?: string,
  searchEnvPaths?: string[]
): { client: TranscriptionClient; ownsClient: boolean } {
  if (maybeClient) {
    return { client: maybeClient, ownsClient: false };
  }
  const apiKey = loadApiKey(API_KEY_ENV, { searchPaths: searchEnvPaths });
  const client = new WhisperClient({ apiKey, baseUrl: baseUrl ?? DEFAULT_BASE_URL });
  return { client, ownsClient: true };
}

export async function transcribeAudio(options: TranscribeOptions): Promise<Transcript> {
  const {
    audioPath,
    model = DEFAULT_MODEL,
    language,
    prompt,
    temperature,
    client: providedClient,
    baseUrl,
    searchEnvPaths
  } = options;

  if (!audioPath) {
    throw new Error("Specify audioPath.");
  }
  const resolvedPath = path.resolve(audioPath);
  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Audio file not found: ${resolvedPath}`);
  }

  const { client, ownsClient } = ensureClient(providedClient, baseUrl, searchEnvPaths);
  try {
    console.info(
      `Transcribing ${resolvedPath} (model=${model}, language=${language ?? "auto"})`
    );
    return await client.transcribe(resolvedPath, { model, language, prompt, temperature });
  } finally {
    if (ownsClient) {
      client.close();
    }
  }
}

export async function transcribeToFile(
  options: TranscribeOptions & { outputPath: string }
): Promise<Transcript> {
  const transcript = await transcribeAudio(options);
  const outputPath = path.resolve(options.outputPath);
  console.info(`Writing transcript JSON to ${outputPath}`);
  fs.writeFileSync(outputPath, JSON.stringify(transcript, null, 2), {
    encoding: "utf-8"
  });
  return transcript;
}

/** Transcribes one audio file and writes its SRT. Returns the SRT path. */
export async function generateSubtitles(options: GenerateSubtitlesOptions): Promise<string> {
  console.info(`Extracting subtitles for '${path.basename(options.audioPath)}' ...`);
  const startedAt = Date.now();

  const transcript = await transcribeAudio(options);
  const output = srt(transcript, options.srtPath, options.config ?? new SubtitleConfig());

  const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);
  console.info(`Finished generating subtitles in ${elapsed}s.`);
  return output;
}
