import { beforeEach, describe, expect, it } from "vitest";
import { TranscriptionProcessor } from "../TranscriptionProcessor";
import { TranscriptHub } from "../../services/transcription/TranscriptHub";
import type { Frame } from "../../types";
import { FrameDirection, lifecycleFrame, textFrame } from "../../types";

const NOW = new Date("2024-05-02T14:30:00.000Z");

describe("TranscriptionProcessor", () => {
  let hub: TranscriptHub;

  beforeEach(() => {
    hub = new TranscriptHub(() => NOW);
  });

  it("records each user transcription and publishes the transcript", () => {
    const processor = new TranscriptionProcessor("user", hub);
    const frame = textFrame("  where is my order  ");

    const emissions = [...processor.handle(frame, FrameDirection.DOWNSTREAM)];

    expect(hub.snapshot()).toEqual([
      { speaker: "user", text: "where is my order", timestamp: NOW.toISOString() },
    ]);
    expect(emissions).toEqual([
      {
        frame: {
          kind: "transport-message",
          payload: {
            type: "transcript",
            entries: [
              { speaker: "user", text: "where is my order", timestamp: NOW.toISOString() },
            ],
          },
        },
        direction: FrameDirection.DOWNSTREAM,
      },
      { frame, direction: FrameDirection.DOWNSTREAM },
    ]);
  });

  it("skips blank user text", () => {
    const processor = new TranscriptionProcessor("user", hub);
    const frame = textFrame("   ");

    expect([...processor.handle(frame, FrameDirection.DOWNSTREAM)]).toEqual([
      { frame, direction: FrameDirection.DOWNSTREAM },
    ]);
    expect(hub.getEntries()).toEqual([]);
  });

  it("joins bot chunks into one entry when the bot stops speaking", () => {
    const processor = new TranscriptionProcessor("bot", hub);
    const run = (frame: Frame, direction: FrameDirection) => [
      ...processor.handle(frame, direction),
    ];

    run(textFrame("Hel"), FrameDirection.DOWNSTREAM);
    run(textFrame("lo"), FrameDirection.DOWNSTREAM);
    expect(hub.getEntries()).toEqual([]);

    run(lifecycleFrame("bot-stopped-speaking"), FrameDirection.UPSTREAM);
    run(lifecycleFrame("bot-stopped-speaking"), FrameDirection.DOWNSTREAM);

    expect(hub.snapshot()).toEqual([
      { speaker: "bot", text: "Hello", timestamp: NOW.toISOString() },
    ]);
  });

  it("names itself after its role", () => {
    expect(new TranscriptionProcessor("bot", hub).name).toBe("TranscriptionProcessor(bot)");
  });
});
