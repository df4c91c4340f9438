import type OpenAI from "openai";
import { toFile } from "openai";
import { FrameProcessor } from "../../core/FrameProcessor";
import type { Emission, Frame } from "../../types";
import {
  FrameDirection,
  isLifecycle,
  textFrame,
  transportMessage,
} from "../../types";
import { encodeWav } from "../../utils/wav";
import { APOLOGY_MESSAGES } from "../../config/prompts";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import {
  ErrorCodes,
  ErrorSeverity,
  VoiceAgentError,
  describeError,
} from "../../utils/error";
import { delay } from "./client";

export interface GroqSTTOptions {
  model: string;
  language?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * Segmented speech-to-text: collects the user's audio between the
 * started/stopped speaking events and transcribes it as one request.
 * Input audio is consumed here.
 */
export class GroqSTTService extends FrameProcessor {
  readonly name = "GroqSTTService";
  private readonly MIN_CHUNK_SIZE = 4000;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private chunks: Buffer[] = [];
  private userSpeaking = false;
  private sampleRate = 16000;
  private channels = 1;
  private logger = LoggingService.getInstance();

  constructor(
    private readonly client: OpenAI,
    private readonly options: GroqSTTOptions
  ) {
    super();
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async *handle(frame: Frame, direction: FrameDirection): AsyncIterable<Emission> {
    if (direction !== FrameDirection.DOWNSTREAM) {
      yield { frame, direction };
      return;
    }

    if (frame.kind === "audio") {
      if (this.userSpeaking) {
        this.chunks.push(frame.audio);
        this.sampleRate = frame.sampleRate;
        this.channels = frame.channels;
      }
      return;
    }

    if (isLifecycle(frame, "user-started-speaking")) {
      this.userSpeaking = true;
      this.chunks = [];
    }

    yield { frame, direction };

    if (isLifecycle(frame, "user-stopped-speaking")) {
      this.userSpeaking = false;
      const audio = Buffer.concat(this.chunks);
      this.chunks = [];

      // check if audio is too short, if so, skip
      if (audio.byteLength < this.MIN_CHUNK_SIZE) {
        this.logger.log(LogLevel.DEBUG, "Skipping short audio segment", this.name, {
          byteLength: audio.byteLength,
        });
        return;
      }

      let transcript: string;
      try {
        transcript = await this.transcribe(audio);
      } catch (error) {
        this.logger.error(
          error instanceof VoiceAgentError
            ? error
            : new VoiceAgentError(
                "Transcription failed",
                ErrorCodes.TRANSCRIPTION_FAILED,
                ErrorSeverity.MEDIUM,
                { component: this.name, originalError: describeError(error) }
              )
        );
        yield this.downstream(
          transportMessage({ type: "error", message: APOLOGY_MESSAGES.transcription })
        );
        return;
      }

      if (transcript) {
        yield this.downstream(textFrame(transcript));
      }
    }
  }

  async cleanup(): Promise<void> {
    this.chunks = [];
    this.userSpeaking = false;
  }

  private async transcribe(audio: Buffer): Promise<string> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const file = await toFile(
          encodeWav(audio, this.sampleRate, this.channels),
          "speech.wav",
          { type: "audio/wav" }
        );
        const transcription = await this.client.audio.transcriptions.create({
          file,
          model: this.options.model,
          language: this.options.language ?? "en",
          response_format: "json",
        });

        this.logger.log(LogLevel.INFO, "Transcription successful", this.name, {
          attempt,
          text: transcription.text,
        });
        return transcription.text.trim();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt < this.maxRetries) {
          await delay(this.retryDelayMs);
        }
      }
    }

    throw new VoiceAgentError(
      "Max retries exceeded for transcription",
      ErrorCodes.TRANSCRIPTION_FAILED,
      ErrorSeverity.MEDIUM,
      { component: this.name, originalError: lastError?.message }
    );
  }
}
