import type { BackendConfig } from "../../config";
import type { FrameProcessor } from "../../core/FrameProcessor";
import type { LLMContext } from "../../core/LLMContext";
import { createGroqClient } from "./client";
import { GroqSTTService } from "./GroqSTTService";
import { GroqLLMService } from "./GroqLLMService";
import { GroqTTSService } from "./GroqTTSService";

export interface SessionBackends {
  stt: FrameProcessor;
  llm: FrameProcessor;
  tts: FrameProcessor;
}

// Builds one session's backend stages around that session's context
export type BackendFactory = (context: LLMContext) => SessionBackends;

/**
 * Creates the shared Groq client once and returns a factory for the
 * per-session stages. Throws MISSING_CREDENTIALS without an API key.
 */
export function createGroqBackends(config: BackendConfig): BackendFactory {
  const client = createGroqClient(config);

  return (context) => ({
    stt: new GroqSTTService(client, { model: config.sttModel }),
    llm: new GroqLLMService(client, context, { model: config.llmModel }),
    tts: new GroqTTSService(client, {
      model: config.ttsModel,
      voice: config.ttsVoice,
    }),
  });
}
