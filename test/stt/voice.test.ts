import { describe, expect, it } from "vitest";
import { InputError, ServiceError } from "../../src/core/errors.js";
import { TimeoutError } from "../../src/stt/recorder.js";
import { VoiceTranscriber, type AudioSource, type SpeechToText } from "../../src/stt/voice.js";

const audio: AudioSource = { record: async () => Buffer.from("wav") };

function failingAudio(error: Error): AudioSource {
  return {
    record: async () => {
      throw error;
    },
  };
}

function stt(result: string | Error): SpeechToText {
  return {
    transcribe: async () => {
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

describe("VoiceTranscriber", () => {
  it("returns the transcript", async () => {
    await expect(new VoiceTranscriber(audio, stt("open notepad")).capture()).resolves.toEqual({
      ok: true,
      text: "open notepad",
    });
  });

  it("maps recorder and service errors to failures", async () => {
    await expect(
      new VoiceTranscriber(failingAudio(new TimeoutError("No speech within 10000ms")), stt("x")).capture()
    ).resolves.toEqual({ ok: false, failure: "timeout", detail: "No speech within 10000ms" });

    await expect(
      new VoiceTranscriber(audio, stt(new InputError("No speech detected"))).capture()
    ).resolves.toEqual({ ok: false, failure: "unintelligible", detail: "No speech detected" });

    await expect(
      new VoiceTranscriber(audio, stt(new ServiceError("Whisper STT 503: busy"))).capture()
    ).resolves.toEqual({ ok: false, failure: "service_unavailable", detail: "Whisper STT 503: busy" });
  });

  it("lets unexpected errors through", async () => {
    await expect(
      new VoiceTranscriber(failingAudio(new RangeError("bug")), stt("x")).capture()
    ).rejects.toBeInstanceOf(RangeError);
  });
});
