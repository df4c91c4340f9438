import { describe, expect, it } from "vitest";
import { deserializeAudio, serializeAudio } from "../JsonFrameSerializer";
import { audioFrame } from "../../types";
import { ErrorCodes, VoiceAgentError } from "../../utils/error";

describe("deserializeAudio", () => {
  it("decodes base64 audio with default format", () => {
    expect(deserializeAudio({ data: "AAEC" })).toEqual(
      audioFrame(Buffer.from([0, 1, 2]), 16000, 1)
    );
  });

  it("accepts binary attachments and explicit format", () => {
    const data = Buffer.from([4, 5, 6, 7]);

    expect(deserializeAudio({ data, sampleRate: 48000, channels: 2 })).toEqual(
      audioFrame(data, 48000, 2)
    );
    expect(deserializeAudio({ data: new Uint8Array([1, 2]).buffer }).audio).toEqual(
      Buffer.from([1, 2])
    );
  });

  it.each([
    ["a number", { data: 42 }],
    ["invalid base64", { data: "not base64!" }],
    ["a zero sample rate", { data: "AAEC", sampleRate: 0 }],
    ["three channels", { data: "AAEC", channels: 3 }],
    ["no payload", undefined],
  ])("rejects %s", (_label, payload) => {
    let caught: unknown;
    try {
      deserializeAudio(payload);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(VoiceAgentError);
    expect(caught instanceof VoiceAgentError && caught.code).toBe(
      ErrorCodes.FRAME_DESERIALIZATION_FAILED
    );
  });
});

describe("serializeAudio", () => {
  it("encodes outbound audio as base64", () => {
    expect(serializeAudio(audioFrame(Buffer.from([0, 1, 2]), 24000, 1))).toEqual({
      data: "AAEC",
      sampleRate: 24000,
      channels: 1,
    });
  });
});
