import { z } from "zod";
import type { AudioFrame } from "../types";
import { audioFrame } from "../types";
import { ErrorCodes, ErrorSeverity, VoiceAgentError } from "../utils/error";

export const DEFAULT_INPUT_SAMPLE_RATE = 16000;
export const DEFAULT_INPUT_CHANNELS = 1;

// socket.io hands binary attachments over as Buffers on Node
const inboundAudioSchema = z.object({
  data: z.union([
    z.string().base64(),
    z.custom<Buffer>((value) => Buffer.isBuffer(value)),
    z.instanceof(ArrayBuffer),
  ]),
  sampleRate: z.number().int().positive().default(DEFAULT_INPUT_SAMPLE_RATE),
  channels: z.number().int().min(1).max(2).default(DEFAULT_INPUT_CHANNELS),
});

export interface OutboundAudioPayload {
  data: string;
  sampleRate: number;
  channels: number;
}

export function deserializeAudio(payload: unknown): AudioFrame {
  const parsed = inboundAudioSchema.safeParse(payload);
  if (!parsed.success) {
    throw new VoiceAgentError(
      "Invalid audio payload",
      ErrorCodes.FRAME_DESERIALIZATION_FAILED,
      ErrorSeverity.LOW,
      {
        component: "JsonFrameSerializer",
        issues: parsed.error.issues.map((issue) => issue.message),
      }
    );
  }

  const { data, sampleRate, channels } = parsed.data;
  const audio =
    typeof data === "string"
      ? Buffer.from(data, "base64")
      : Buffer.isBuffer(data)
        ? data
        : Buffer.from(data);
  return audioFrame(audio, sampleRate, channels);
}

export function serializeAudio(frame: AudioFrame): OutboundAudioPayload {
  return {
    data: frame.audio.toString("base64"),
    sampleRate: frame.sampleRate,
    channels: frame.channels,
  };
}
