/**
 * Whisper STT client over HTTP: POST /api/speech-to-text with audio/wav,
 * JSON `{ text }` back.
 */

import { TRANSCRIBE_TIMEOUT_MS } from "../config/constants.js";
import { InputError, ServiceError } from "../core/errors.js";
import { describeError } from "../ui/logger.js";

export type Fetcher = typeof fetch;

export interface WhisperClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetcher?: Fetcher;
}

function readText(body: unknown): string {
  if (typeof body === "object" && body !== null && "text" in body && typeof body.text === "string") {
    return body.text.trim();
  }
  return "";
}

export class WhisperClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetcher: Fetcher;

  constructor(options: WhisperClientOptions) {
    this.url = `${options.baseUrl.replace(/\/+$/, "")}/api/speech-to-text`;
    this.timeoutMs = options.timeoutMs ?? TRANSCRIBE_TIMEOUT_MS;
    this.fetcher = options.fetcher ?? fetch;
  }

  /**
   * Throws ServiceError when the server cannot be reached or answers with
   * an error, InputError when it heard nothing.
   */
  async transcribe(wav: Buffer): Promise<string> {
    let response: Response;
    try {
      response = await this.fetcher(this.url, {
        method: "POST",
        headers: { "Content-Type": "audio/wav" },
        body: wav,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ServiceError(`Whisper unreachable at ${this.url}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ServiceError(`Whisper STT ${response.status}: ${body || response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ServiceError(`Whisper returned invalid JSON: ${describeError(error)}`, {
        cause: error,
      });
    }

    const text = readText(body);
    if (!text) throw new InputError("No speech detected");
    return text;
  }
}
