/**
 * Microphone capture through SoX's `rec`.
 *
 * One call records one phrase as 16 kHz mono WAV. SoX's `silence` effect
 * waits for sound above the threshold, stops after `pauseThresholdMs` of
 * quiet, and `trim` caps the phrase length. The onset timeout is enforced
 * here: if no audio past the WAV header arrives in time, `rec` is killed.
 */

import { spawn } from "node:child_process";
import { CALIBRATION_DURATION_MS } from "../config/constants.js";
import { InputError, ServiceError } from "../core/errors.js";
import type { Logger } from "../ui/logger.js";

const WAV_HEADER_BYTES = 44;
const SAMPLE_RATE = 16_000;
const FULL_SCALE = 32_768;
const AMBIENT_MULTIPLIER = 1.5;

export interface RecorderOptions {
  listenTimeoutMs: number;
  phraseTimeLimitMs: number;
  pauseThresholdMs: number;
  /** Minimum speech energy on the 16-bit sample scale. */
  energyThreshold: number;
  systemLog: Logger;
  program?: string;
}

export class TimeoutError extends InputError {}

/** "RMS     amplitude:     0.012345" from `sox … stat`. */
export function parseRmsAmplitude(statOutput: string): number | undefined {
  const match = /RMS\s+amplitude:\s+([\d.]+)/.exec(statOutput);
  if (!match?.[1]) return undefined;
  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

/** Silence threshold in percent of full scale, raised above ambient noise. */
export function silenceThresholdPercent(energyThreshold: number, ambientRms: number | undefined): number {
  const floor = energyThreshold / FULL_SCALE;
  const ambient = (ambientRms ?? 0) * AMBIENT_MULTIPLIER;
  return Math.round(Math.max(floor, ambient) * 100 * 1000) / 1000;
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}

export class SoxRecorder {
  private readonly program: string;
  private calibration: Promise<number> | undefined;

  constructor(private readonly options: RecorderOptions) {
    this.program = options.program ?? "rec";
  }

  /** Measured once per process; later calls reuse the first result. */
  calibrate(): Promise<number> {
    this.calibration ??= this.measureAmbient().then((rms) => {
      const threshold = silenceThresholdPercent(this.options.energyThreshold, rms);
      this.options.systemLog(`[recorder] Silence threshold ${threshold}%`);
      return threshold;
    });
    return this.calibration;
  }

  async record(): Promise<Buffer> {
    const threshold = await this.calibrate();
    const args = [
      "-q", "-c", "1", "-r", String(SAMPLE_RATE), "-b", "16", "-t", "wav", "-",
      "silence", "1", "0.1", `${threshold}%`, "1", seconds(this.options.pauseThresholdMs), `${threshold}%`,
      "trim", "0", seconds(this.options.phraseTimeLimitMs),
    ];

    return new Promise((resolve, reject) => {
      const child = spawn(this.program, args, { stdio: ["ignore", "pipe", "pipe"] });
      const chunks: Buffer[] = [];
      let received = 0;
      let timedOut = false;

      const onsetTimer = setTimeout(() => {
        if (received <= WAV_HEADER_BYTES) {
          timedOut = true;
          child.kill();
        }
      }, this.options.listenTimeoutMs);

      child.stdout.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
        received += chunk.length;
      });

      child.once("error", (error) => {
        clearTimeout(onsetTimer);
        reject(new ServiceError(`Could not start ${this.program}: ${error.message}`, { cause: error }));
      });

      child.once("close", (code) => {
        clearTimeout(onsetTimer);
        if (timedOut) {
          reject(new TimeoutError(`No speech within ${this.options.listenTimeoutMs}ms`));
          return;
        }
        if (code !== 0) {
          reject(new ServiceError(`${this.program} exited with code ${code ?? "null"}`));
          return;
        }
        if (received <= WAV_HEADER_BYTES) {
          reject(new InputError("No audio captured"));
          return;
        }
        resolve(Buffer.concat(chunks));
      });
    });
  }

  private measureAmbient(): Promise<number | undefined> {
    const args = ["-q", "-n", "stat", "trim", "0", seconds(CALIBRATION_DURATION_MS)];
    return new Promise((resolve) => {
      const child = spawn(this.program, args, { stdio: ["ignore", "ignore", "pipe"] });
      let stderr = "";
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf8");
      });
      child.once("error", (error) => {
        this.options.systemLog(`[recorder] Calibration skipped: ${error.message}`);
        resolve(undefined);
      });
      child.once("close", () => resolve(parseRmsAmplitude(stderr)));
    });
  }
}
