import axios, { AxiosAdapter, AxiosInstance } from "axios";
import FormData from "form-data";
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { WhisperError } from "./errors";
import { parseTranscript } from "./transcript";
import { Transcript } from "./types";

export const DEFAULT_BASE_URL = "http://localhost:8000";
export const BASE_URL_ENV = "WHISPER_BASE_URL";
export const DEFAULT_MODEL = "Systran/faster-whisper-large-v3";
export const API_KEY_ENV = "WHISPER_API_KEY";
export const DEFAULT_TIMEOUT_MS = 600_000;

export interface TranscriptionRequest {
  model: string;
  language?: string;
  prompt?: string;
  temperature?: number;
}

/** Anything that turns one audio file into a word-timestamped transcript. */
export interface TranscriptionClient {
  transcribe(audioPath: string, request: TranscriptionRequest): Promise<Transcript>;
  close(): void;
}

export interface WhisperClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

function loadEnvFile(filePath: string): void {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    console.warn(
      `Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
    return;
  }
  const parsed = dotenv.parse(content);
  for (const [key, value] of Object.entries(parsed)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

function candidateEnvPaths(extraPaths?: string[]): string[] {
  const seen = new Set<string>();
  const add = (p: string): void => {
    seen.add(path.resolve(p));
  };

  if (extraPaths) {
    for (const p of extraPaths) {
      add(p);
    }
    return Array.from(seen);
  }

  add(path.join(process.cwd(), ".env"));
  add(path.join(path.resolve(__dirname, ".."), ".env"));
  return Array.from(seen);
}

/**
 * Reads an API key from the environment, falling back to `.env` files.
 * When `searchPaths` is given only those files are consulted.
 */
export function loadApiKey(
  envVar = API_KEY_ENV,
  options?: { searchPaths?: string[] }
): string | undefined {
  let apiKey = process.env[envVar];
  if (apiKey) {
    return apiKey;
  }
  for (const envPath of candidateEnvPaths(options?.searchPaths)) {
    if (fs.existsSync(envPath)) {
      loadEnvFile(envPath);
      apiKey = process.env[envVar];
      if (apiKey) {
        return apiKey;
      }
    }
  }
  return undefined;
}

export function requireApiKey(
  envVar = API_KEY_ENV,
  options?: { searchPaths?: string[] }
): string {
  const apiKey = loadApiKey(envVar, options);
  if (!apiKey) {
    throw new Error(
      `${envVar} is not set.\n` +
        "Export the key of your transcription endpoint:\n" +
        `  export ${envVar}=<YOUR_API_KEY>`
    );
  }
  return apiKey;
}

/** Client for an OpenAI-compatible `/v1/audio/transcriptions` endpoint. */
export class WhisperClient implements TranscriptionClient {
  private readonly client: AxiosInstance;

  constructor(options: WhisperClientOptions = {}) {
    const headers: Record<string, string> = {};
    if (options.apiKey) {
      headers.Authorization = `Bearer ${options.apiKey}`;
    }
    this.client = axios.create({
      baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
      headers,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      adapter: options.adapter
    });
  }

  close(): void {
    // Nothing to release; axios keeps no connection of its own.
  }

  async transcribe(audioPath: string, request: TranscriptionRequest): Promise<Transcript> {
    const resolved = path.resolve(audioPath);
    const form = new FormData();
    form.append("file", fs.createReadStream(resolved));
    form.append("model", request.model);
    form.append("response_format", "verbose_json");
    form.append("timestamp_granularities[]", "word");
    form.append("timestamp_granularities[]", "segment");
    if (request.language) {
      form.append("language", request.language);
    }
    if (request.prompt) {
      form.append("prompt", request.prompt);
    }
    if (request.temperature !== undefined) {
      form.append("temperature", String(request.temperature));
    }

    let data: unknown;
    try {
      const response = await this.client.post<unknown>("/v1/audio/transcriptions", form, {
        headers: form.getHeaders()
      });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response ? ` (HTTP ${error.response.status})` : "";
        throw new WhisperError(`Transcription request failed${status}: ${error.message}`);
      }
      throw error;
    }

    try {
      return parseTranscript(data);
    } catch (error) {
      throw new WhisperError(
        `Unexpected transcription response: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

export default WhisperClient;
