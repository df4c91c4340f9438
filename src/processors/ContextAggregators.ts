import { FrameProcessor } from "../core/FrameProcessor";
import type { LLMContextWriter } from "../core/LLMContext";
import type { Emission, Frame } from "../types";
import { FrameDirection, isLifecycle, llmRequestFrame } from "../types";

/**
 * Adds the finished user transcription to the context and asks the LLM to
 * respond. The transcription is replaced by the request so later stages
 * never mistake it for bot output.
 */
export class UserContextAggregator extends FrameProcessor {
  readonly name = "UserContextAggregator";

  constructor(private readonly context: LLMContextWriter) {
    super();
  }

  *handle(frame: Frame, direction: FrameDirection): Iterable<Emission> {
    if (frame.kind === "text" && direction === FrameDirection.DOWNSTREAM) {
      const text = frame.text.trim();
      if (text) {
        this.context.appendMessage("user", text);
        yield this.downstream(llmRequestFrame());
      }
      return;
    }
    yield { frame, direction };
  }
}

/** Adds each completed bot response to the context. */
export class AssistantContextAggregator extends FrameProcessor {
  readonly name = "AssistantContextAggregator";
  private buffer = "";

  constructor(private readonly context: LLMContextWriter) {
    super();
  }

  handle(frame: Frame, direction: FrameDirection): Emission[] {
    if (direction === FrameDirection.DOWNSTREAM) {
      if (frame.kind === "text") {
        this.buffer += frame.text;
      } else if (isLifecycle(frame, "response-end")) {
        const text = this.buffer.trim();
        if (text) {
          this.context.appendMessage("assistant", text);
        }
        this.buffer = "";
      }
    }
    return this.forward(frame, direction);
  }
}
