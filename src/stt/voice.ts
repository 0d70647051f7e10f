import type { Transcriber, TranscriptionFailure, TranscriptionResult } from "../types.js";
import { InputError, ServiceError } from "../core/errors.js";
import { describeError } from "../ui/logger.js";
import { TimeoutError } from "./recorder.js";

export interface AudioSource {
  record(): Promise<Buffer>;
}

export interface SpeechToText {
  transcribe(wav: Buffer): Promise<string>;
}

/** Microphone + speech-to-text. Known capture failures become results; anything else is rethrown. */
export class VoiceTranscriber implements Transcriber {
  constructor(
    private readonly audio: AudioSource,
    private readonly stt: SpeechToText
  ) {}

  async capture(): Promise<TranscriptionResult> {
    try {
      const wav = await this.audio.record();
      const text = await this.stt.transcribe(wav);
      return { ok: true, text };
    } catch (error) {
      const failure = classify(error);
      if (!failure) throw error;
      return { ok: false, failure, detail: describeError(error) };
    }
  }
}

function classify(error: unknown): TranscriptionFailure | undefined {
  if (error instanceof TimeoutError) return "timeout";
  if (error instanceof InputError) return "unintelligible";
  if (error instanceof ServiceError) return "service_unavailable";
  return undefined;
}
