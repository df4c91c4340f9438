import { FrameProcessor } from "../core/FrameProcessor";
import type { Emission, Frame, Speaker } from "../types";
import { FrameDirection, isLifecycle, transportMessage } from "../types";
import type { TranscriptHub } from "../services/transcription/TranscriptHub";

/**
 * Records one side of the conversation in the transcript hub.
 *
 * User text arrives as finished transcriptions and is recorded as-is.
 * Bot text streams in token by token, so it is buffered and recorded as a
 * single utterance once the bot stops speaking.
 */
export class TranscriptionProcessor extends FrameProcessor {
  readonly name: string;
  private botBuffer = "";

  constructor(
    private readonly role: Speaker,
    private readonly hub: TranscriptHub
  ) {
    super();
    this.name = `TranscriptionProcessor(${role})`;
  }

  *handle(frame: Frame, direction: FrameDirection): Iterable<Emission> {
    if (frame.kind === "text" && direction === FrameDirection.DOWNSTREAM) {
      if (this.role === "bot") {
        this.botBuffer += frame.text;
      } else {
        const text = frame.text.trim();
        if (text) {
          this.hub.addMessage("user", text);
          yield this.downstream(
            transportMessage({ type: "transcript", entries: this.hub.snapshot() })
          );
        }
      }
    }

    if (this.role === "bot" && isLifecycle(frame, "bot-stopped-speaking")) {
      const text = this.botBuffer.trim();
      if (text) {
        this.hub.addMessage("bot", text);
      }
      this.botBuffer = "";
    }

    yield { frame, direction };
  }
}
