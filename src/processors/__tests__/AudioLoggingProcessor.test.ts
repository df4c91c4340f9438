import { describe, expect, it } from "vitest";
import { AudioLoggingProcessor } from "../AudioLoggingProcessor";
import { FrameDirection, audioFrame, textFrame } from "../../types";

describe("AudioLoggingProcessor", () => {
  it("counts inbound audio and forwards everything", () => {
    const processor = new AudioLoggingProcessor("session-1");
    const chunk = audioFrame(Buffer.alloc(640), 16000, 1);

    for (let i = 0; i < 3; i++) {
      expect(processor.handle(chunk, FrameDirection.DOWNSTREAM)).toEqual([
        { frame: chunk, direction: FrameDirection.DOWNSTREAM },
      ]);
    }
    processor.handle(chunk, FrameDirection.UPSTREAM);
    processor.handle(textFrame("hi"), FrameDirection.DOWNSTREAM);

    expect(processor.getStats()).toEqual({ chunks: 3, bytes: 1920 });
  });
});
