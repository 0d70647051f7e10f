/**
 * Speech-to-text side of the assistant: text cleanup, wake detection and
 * the microphone transcriber.
 */

export { normalize } from "./normalizer.js";
export { detectWake, soundsLike, type WakeResult } from "./wake.js";
export { SoxRecorder, TimeoutError, parseRmsAmplitude, silenceThresholdPercent } from "./recorder.js";
export { WhisperClient } from "./whisper.js";
export { VoiceTranscriber, type AudioSource, type SpeechToText } from "./voice.js";
