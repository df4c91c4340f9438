import { beforeEach, describe, expect, it, vi } from "vitest";
import OpenAI from "openai";
import { GroqTTSService, splitPcm } from "../GroqTTSService";
import { APOLOGY_MESSAGES } from "../../../config/prompts";
import type { Emission, Frame } from "../../../types";
import { FrameDirection, lifecycleFrame, textFrame } from "../../../types";
import { encodeWav } from "../../../utils/wav";
import { collect } from "../../../testUtils";

// Hoist mocks
const mocks = vi.hoisted(() => ({
  speak: vi.fn(),
}));

vi.mock("openai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("openai")>();
  class MockOpenAI {
    audio = { speech: { create: mocks.speak } };
  }
  return { ...actual, default: MockOpenAI, OpenAI: MockOpenAI };
});

function speechResponse(wav: Buffer) {
  return {
    arrayBuffer: async () => Uint8Array.from(wav).buffer,
  };
}

describe("GroqTTSService", () => {
  let tts: GroqTTSService;
  const send = (frame: Frame): Promise<Emission[]> =>
    collect(tts.handle(frame, FrameDirection.DOWNSTREAM));

  beforeEach(() => {
    mocks.speak.mockReset();
    tts = new GroqTTSService(new OpenAI({ apiKey: "test-key" }), {
      model: "playai-tts",
      voice: "Celeste-PlayAI",
    });
  });

  it("speaks the whole response in short chunks before it ends", async () => {
    // Half a second of 16 kHz mono PCM16
    mocks.speak.mockResolvedValue(speechResponse(encodeWav(Buffer.alloc(16000), 16000, 1)));

    await send(lifecycleFrame("response-start"));
    await expect(send(textFrame("Your order "))).resolves.toHaveLength(1);
    await send(textFrame("has shipped."));
    const emissions = await send(lifecycleFrame("response-end"));

    expect(mocks.speak).toHaveBeenCalledWith({
      model: "playai-tts",
      voice: "Celeste-PlayAI",
      input: "Your order has shipped.",
      response_format: "wav",
    });
    expect(
      emissions.map(({ frame }) =>
        frame.kind === "audio" ? `audio:${frame.audio.length}@${frame.sampleRate}` : frame.kind
      )
    ).toEqual(["audio:6400@16000", "audio:6400@16000", "audio:3200@16000", "lifecycle"]);
  });

  it("apologises when synthesis fails", async () => {
    mocks.speak.mockRejectedValue(new Error("429 Too Many Requests"));

    await send(textFrame("Hello"));
    const emissions = await send(lifecycleFrame("response-end"));

    expect(emissions.map(({ frame }) => frame)).toEqual([
      {
        kind: "transport-message",
        payload: { type: "error", message: APOLOGY_MESSAGES.synthesis },
      },
      { kind: "lifecycle", event: "response-end" },
    ]);
  });

  it("apologises when the audio is not a WAV file", async () => {
    mocks.speak.mockResolvedValue(speechResponse(Buffer.from("not audio")));

    await send(textFrame("Hello"));
    const emissions = await send(lifecycleFrame("response-end"));

    expect(emissions.map(({ frame }) => frame.kind)).toEqual(["transport-message", "lifecycle"]);
  });

  it("stays silent for an empty response", async () => {
    await send(textFrame("   "));

    await expect(send(lifecycleFrame("response-end"))).resolves.toEqual([
      { frame: lifecycleFrame("response-end"), direction: FrameDirection.DOWNSTREAM },
    ]);
    expect(mocks.speak).not.toHaveBeenCalled();
  });
});

describe("splitPcm", () => {
  it("cuts on whole sample frames", () => {
    const chunks = splitPcm({ pcm: Buffer.alloc(10), sampleRate: 1000, channels: 2 }, 1);

    expect(chunks.map((chunk) => chunk.length)).toEqual([4, 4, 2]);
  });
});
