import { FrameProcessor } from "../core/FrameProcessor";
import type {
  ConversationState,
  Emission,
  Frame,
  LifecycleEvent,
  TransportMessageFrame,
} from "../types";
import { FrameDirection, transportMessage } from "../types";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";

interface StateMapping {
  state: ConversationState;
  downstreamOnly: boolean;
}

const STATE_BY_EVENT: Partial<Record<LifecycleEvent, StateMapping>> = {
  "session-start": { state: "listening", downstreamOnly: true },
  "user-started-speaking": { state: "listening", downstreamOnly: true },
  "user-stopped-speaking": { state: "processing", downstreamOnly: true },
  "bot-started-speaking": { state: "responding", downstreamOnly: false },
  "bot-stopped-speaking": { state: "listening", downstreamOnly: false },
};

/** Tells the client whether the assistant is listening, thinking or talking. */
export class ConversationStateProcessor extends FrameProcessor {
  readonly name = "ConversationStateProcessor";
  private state?: ConversationState;
  private logger = LoggingService.getInstance();

  getState(): ConversationState | undefined {
    return this.state;
  }

  observe(
    frame: Frame,
    direction: FrameDirection
  ): TransportMessageFrame | undefined {
    if (frame.kind !== "lifecycle") return undefined;

    const mapping = STATE_BY_EVENT[frame.event];
    if (!mapping) return undefined;
    if (mapping.downstreamOnly && direction !== FrameDirection.DOWNSTREAM) {
      return undefined;
    }

    this.logger.log(LogLevel.DEBUG, `Lifecycle event: ${frame.event}`, this.name);
    if (this.state === mapping.state) return undefined;

    this.state = mapping.state;
    return transportMessage({ type: "state", value: mapping.state });
  }

  *handle(frame: Frame, direction: FrameDirection): Iterable<Emission> {
    const notification = this.observe(frame, direction);
    if (notification) {
      yield this.downstream(notification);
    }
    yield { frame, direction };
  }
}
