import type OpenAI from "openai";
import { FrameProcessor } from "../../core/FrameProcessor";
import type { Emission, Frame } from "../../types";
import {
  FrameDirection,
  audioFrame,
  isLifecycle,
  transportMessage,
} from "../../types";
import { decodeWav } from "../../utils/wav";
import type { PcmAudio } from "../../utils/wav";
import { APOLOGY_MESSAGES } from "../../config/prompts";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import {
  ErrorCodes,
  ErrorSeverity,
  VoiceAgentError,
  describeError,
} from "../../utils/error";

export interface GroqTTSOptions {
  model: string;
  voice: string;
  chunkMs?: number;
}

/**
 * Speaks each completed bot response. Text chunks pass through so the
 * assistant aggregator still sees them; audio is emitted in short chunks
 * ahead of `response-end`.
 */
export class GroqTTSService extends FrameProcessor {
  readonly name = "GroqTTSService";
  private buffer = "";
  private logger = LoggingService.getInstance();

  constructor(
    private readonly client: OpenAI,
    private readonly options: GroqTTSOptions
  ) {
    super();
  }

  async *handle(frame: Frame, direction: FrameDirection): AsyncIterable<Emission> {
    if (direction === FrameDirection.DOWNSTREAM) {
      if (frame.kind === "text") {
        this.buffer += frame.text;
      } else if (isLifecycle(frame, "response-start")) {
        this.buffer = "";
      } else if (isLifecycle(frame, "response-end")) {
        yield* this.speak();
      }
    }
    yield { frame, direction };
  }

  private async *speak(): AsyncIterable<Emission> {
    const text = this.buffer.trim();
    this.buffer = "";
    if (!text) return;

    let speech: PcmAudio;
    try {
      speech = await this.synthesize(text);
    } catch (error) {
      this.logger.error(
        new VoiceAgentError(
          "Speech synthesis failed",
          ErrorCodes.SPEECH_SYNTHESIS_FAILED,
          ErrorSeverity.MEDIUM,
          { component: this.name, originalError: describeError(error) }
        )
      );
      yield this.downstream(
        transportMessage({ type: "error", message: APOLOGY_MESSAGES.synthesis })
      );
      return;
    }

    for (const chunk of splitPcm(speech, this.options.chunkMs ?? 200)) {
      yield this.downstream(audioFrame(chunk, speech.sampleRate, speech.channels));
    }
  }

  private async synthesize(text: string): Promise<PcmAudio> {
    const response = await this.client.audio.speech.create({
      model: this.options.model,
      voice: this.options.voice,
      input: text,
      response_format: "wav",
    });
    const wav = Buffer.from(await response.arrayBuffer());

    this.logger.log(LogLevel.DEBUG, "Speech synthesized", this.name, {
      characters: text.length,
      bytes: wav.byteLength,
    });
    return decodeWav(wav);
  }
}

export function splitPcm(audio: PcmAudio, chunkMs: number): Buffer[] {
  const frameBytes = audio.channels * 2;
  const framesPerChunk = Math.max(1, Math.floor((audio.sampleRate * chunkMs) / 1000));
  const chunkBytes = framesPerChunk * frameBytes;

  const chunks: Buffer[] = [];
  for (let offset = 0; offset < audio.pcm.length; offset += chunkBytes) {
    chunks.push(audio.pcm.subarray(offset, offset + chunkBytes));
  }
  return chunks;
}
