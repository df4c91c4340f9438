import OpenAI from "openai";
import type { BackendConfig } from "../../config";
import { ErrorCodes, ErrorSeverity, VoiceAgentError } from "../../utils/error";

// Groq serves an OpenAI-compatible API; retries are handled per stage
export function createGroqClient(config: BackendConfig): OpenAI {
  if (!config.apiKey) {
    throw new VoiceAgentError(
      "Missing GROQ_API_KEY",
      ErrorCodes.MISSING_CREDENTIALS,
      ErrorSeverity.CRITICAL,
      { component: "GroqClient" }
    );
  }

  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    maxRetries: 0,
  });
}

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
