import { FrameProcessor } from "../core/FrameProcessor";
import type { AudioFrame, Emission, Frame, JsonValue } from "../types";
import { FrameDirection, isLifecycle, lifecycleFrame } from "../types";

export interface SessionTransport {
  sendAudio(frame: AudioFrame): void;
  sendMessage(payload: JsonValue): void;
}

/**
 * Hands bot audio and transport messages to the client connection and
 * announces when the bot starts and stops speaking, in both directions.
 * Every `response-end` closes the bot's turn, spoken or not.
 */
export class OutputTransportProcessor extends FrameProcessor {
  readonly name = "OutputTransportProcessor";
  private botSpeaking = false;

  constructor(private readonly transport: SessionTransport) {
    super();
  }

  isBotSpeaking(): boolean {
    return this.botSpeaking;
  }

  *handle(frame: Frame, direction: FrameDirection): Iterable<Emission> {
    if (direction !== FrameDirection.DOWNSTREAM) {
      yield { frame, direction };
      return;
    }

    if (frame.kind === "audio") {
      if (!this.botSpeaking) {
        this.botSpeaking = true;
        yield* this.announce(lifecycleFrame("bot-started-speaking"));
      }
      this.transport.sendAudio(frame);
    } else if (frame.kind === "transport-message") {
      this.transport.sendMessage(frame.payload);
    }

    yield { frame, direction };

    // A reply that produced no audio still ends the bot's turn
    if (
      isLifecycle(frame, "response-end") ||
      (this.botSpeaking && isLifecycle(frame, "session-end"))
    ) {
      this.botSpeaking = false;
      yield* this.announce(lifecycleFrame("bot-stopped-speaking"));
    }
  }

  private *announce(frame: Frame): Iterable<Emission> {
    yield this.upstream(frame);
    yield this.downstream(frame);
  }
}
