import { describe, expect, it } from "vitest";
import { ConversationStateProcessor } from "../ConversationStateProcessor";
import type { LifecycleEvent, TransportMessageFrame } from "../../types";
import { FrameDirection, lifecycleFrame, textFrame } from "../../types";

function statesFor(
  processor: ConversationStateProcessor,
  events: Array<[LifecycleEvent, FrameDirection]>
) {
  return events
    .map(([event, direction]) => processor.observe(lifecycleFrame(event), direction))
    .filter((message): message is TransportMessageFrame => message !== undefined)
    .map((message) => message.payload);
}

describe("ConversationStateProcessor", () => {
  it("emits only when the state changes", () => {
    const processor = new ConversationStateProcessor();

    const states = statesFor(processor, [
      ["session-start", FrameDirection.DOWNSTREAM],
      ["user-started-speaking", FrameDirection.DOWNSTREAM],
      ["user-stopped-speaking", FrameDirection.DOWNSTREAM],
      ["user-started-speaking", FrameDirection.DOWNSTREAM],
    ]);

    expect(states).toEqual([
      { type: "state", value: "listening" },
      { type: "state", value: "processing" },
      { type: "state", value: "listening" },
    ]);
  });

  it("tracks bot speech in either direction but user speech only downstream", () => {
    const processor = new ConversationStateProcessor();

    const states = statesFor(processor, [
      ["user-stopped-speaking", FrameDirection.UPSTREAM],
      ["bot-started-speaking", FrameDirection.UPSTREAM],
      ["bot-started-speaking", FrameDirection.DOWNSTREAM],
      ["bot-stopped-speaking", FrameDirection.UPSTREAM],
    ]);

    expect(states).toEqual([
      { type: "state", value: "responding" },
      { type: "state", value: "listening" },
    ]);
    expect(processor.getState()).toBe("listening");
  });

  it("ignores frames that carry no state", () => {
    const processor = new ConversationStateProcessor();

    expect(processor.observe(textFrame("hello"), FrameDirection.DOWNSTREAM)).toBeUndefined();
    expect(
      processor.observe(lifecycleFrame("response-start"), FrameDirection.DOWNSTREAM)
    ).toBeUndefined();
    expect(processor.getState()).toBeUndefined();
  });

  it("sends the notification ahead of the frame that caused it", () => {
    const processor = new ConversationStateProcessor();
    const frame = lifecycleFrame("user-stopped-speaking");

    const emissions = [...processor.handle(frame, FrameDirection.DOWNSTREAM)];

    expect(emissions).toEqual([
      {
        frame: { kind: "transport-message", payload: { type: "state", value: "processing" } },
        direction: FrameDirection.DOWNSTREAM,
      },
      { frame, direction: FrameDirection.DOWNSTREAM },
    ]);
  });
});
