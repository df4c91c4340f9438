import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import { Pipeline } from "./Pipeline";
import type { PipelineStatus } from "./Pipeline";
import { LLMContext } from "./LLMContext";
import type { Frame, OrderReader } from "../types";
import { FrameDirection, lifecycleFrame } from "../types";
import { STORE_ASSISTANT_PROMPT } from "../config/prompts";
import type { BackendFactory } from "../services/groq/backends";
import type { TranscriptHub } from "../services/transcription/TranscriptHub";
import { AudioLoggingProcessor } from "../processors/AudioLoggingProcessor";
import { ConversationStateProcessor } from "../processors/ConversationStateProcessor";
import { OrderKnowledgeProcessor } from "../processors/OrderKnowledgeProcessor";
import { TranscriptionProcessor } from "../processors/TranscriptionProcessor";
import {
  AssistantContextAggregator,
  UserContextAggregator,
} from "../processors/ContextAggregators";
import { OutputTransportProcessor } from "../processors/OutputTransportProcessor";
import type { SessionTransport } from "../processors/OutputTransportProcessor";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import type { PipelineTerminatedError } from "../utils/error";

export interface VoiceSessionOptions {
  transport: SessionTransport;
  hub: TranscriptHub;
  orders: OrderReader;
  backends: BackendFactory;
  sessionId?: string;
}

export interface VoiceSessionEvents {
  terminated: (error: PipelineTerminatedError) => void;
  closed: () => void;
}

/**
 * One connected caller: a context seeded with the store prompt and the
 * full processing pipeline around it.
 */
export class VoiceSession extends EventEmitter {
  readonly id: string;
  readonly context: LLMContext;
  private readonly pipeline: Pipeline;
  private closing?: Promise<void>;
  private logger = LoggingService.getInstance();

  constructor(options: VoiceSessionOptions) {
    super();
    this.id = options.sessionId ?? uuidv4();
    this.context = new LLMContext([
      { role: "system", content: STORE_ASSISTANT_PROMPT },
    ]);

    const { stt, llm, tts } = options.backends(this.context);
    this.pipeline = new Pipeline(
      [
        new AudioLoggingProcessor(this.id),
        new ConversationStateProcessor(),
        stt,
        new OrderKnowledgeProcessor(this.context, options.orders),
        new TranscriptionProcessor("user", options.hub),
        new UserContextAggregator(this.context),
        llm,
        new TranscriptionProcessor("bot", options.hub),
        tts,
        new OutputTransportProcessor(options.transport),
        new AssistantContextAggregator(this.context),
      ],
      this.id
    );

    this.pipeline.on("terminated", (error) => {
      this.emit("terminated", error);
    });
  }

  getStatus(): PipelineStatus {
    return this.pipeline.getStatus();
  }

  async start(): Promise<void> {
    await this.pipeline.start();
    this.logger.log(LogLevel.INFO, "Voice session started", "VoiceSession", {
      sessionId: this.id,
    });
  }

  /** Resolves to false when the frame was refused or ended the session. */
  pushFrame(frame: Frame): Promise<boolean> {
    return this.pipeline.queueFrame(frame, FrameDirection.DOWNSTREAM);
  }

  userStartedSpeaking(): Promise<boolean> {
    return this.pushFrame(lifecycleFrame("user-started-speaking"));
  }

  userStoppedSpeaking(): Promise<boolean> {
    return this.pushFrame(lifecycleFrame("user-stopped-speaking"));
  }

  close(): Promise<void> {
    this.closing ??= this.pipeline.stop().then(() => {
      this.logger.log(LogLevel.INFO, "Voice session closed", "VoiceSession", {
        sessionId: this.id,
        status: this.pipeline.getStatus(),
      });
      this.emit("closed");
    });
    return this.closing;
  }

  public on<K extends keyof VoiceSessionEvents>(
    event: K,
    listener: VoiceSessionEvents[K]
  ): this {
    return super.on(event, listener);
  }

  public emit<K extends keyof VoiceSessionEvents>(
    event: K,
    ...args: Parameters<VoiceSessionEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
