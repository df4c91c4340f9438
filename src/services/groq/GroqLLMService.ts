import type OpenAI from "openai";
import type {
  ChatCompletionChunk,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { FrameProcessor } from "../../core/FrameProcessor";
import type { LLMContext } from "../../core/LLMContext";
import type { Emission, Frame, Message } from "../../types";
import {
  FrameDirection,
  lifecycleFrame,
  textFrame,
  transportMessage,
} from "../../types";
import { APOLOGY_MESSAGES } from "../../config/prompts";
import { LoggingService } from "../logging/LoggingService";
import {
  ErrorCodes,
  ErrorSeverity,
  VoiceAgentError,
  describeError,
} from "../../utils/error";

export interface GroqLLMOptions {
  model: string;
  temperature?: number;
}

function toChatMessage(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

/**
 * Streams a chat completion for every `llm-request`, bracketed by
 * `response-start` and `response-end` even when the call fails.
 */
export class GroqLLMService extends FrameProcessor {
  readonly name = "GroqLLMService";
  private logger = LoggingService.getInstance();

  constructor(
    private readonly client: OpenAI,
    private readonly context: LLMContext,
    private readonly options: GroqLLMOptions
  ) {
    super();
  }

  async *handle(frame: Frame, direction: FrameDirection): AsyncIterable<Emission> {
    if (frame.kind !== "llm-request" || direction !== FrameDirection.DOWNSTREAM) {
      yield { frame, direction };
      return;
    }

    yield this.downstream(lifecycleFrame("response-start"));

    let failed = false;
    let stream: AsyncIterable<ChatCompletionChunk> | undefined;
    try {
      stream = await this.client.chat.completions.create({
        model: this.options.model,
        messages: this.context.getMessages().map(toChatMessage),
        temperature: this.options.temperature,
        stream: true,
      });
    } catch (error) {
      failed = true;
      this.reportFailure(error);
    }

    if (stream) {
      const iterator = stream[Symbol.asyncIterator]();
      let finished = false;
      try {
        while (!finished) {
          let next: IteratorResult<ChatCompletionChunk>;
          try {
            next = await iterator.next();
          } catch (error) {
            failed = true;
            this.reportFailure(error);
            break;
          }
          if (next.done) {
            finished = true;
            break;
          }

          const content = next.value.choices[0]?.delta?.content;
          if (content) {
            yield this.downstream(textFrame(content));
          }
        }
      } finally {
        // Abort the HTTP stream when a later stage fails mid-response
        if (!finished && !failed) {
          await iterator.return?.();
        }
      }
    }

    if (failed) {
      yield this.downstream(
        transportMessage({ type: "error", message: APOLOGY_MESSAGES.completion })
      );
    }
    yield this.downstream(lifecycleFrame("response-end"));
  }

  private reportFailure(error: unknown): void {
    this.logger.error(
      new VoiceAgentError(
        "Chat completion failed",
        ErrorCodes.COMPLETION_FAILED,
        ErrorSeverity.MEDIUM,
        { component: this.name, originalError: describeError(error) }
      )
    );
  }
}
