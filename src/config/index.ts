import { z } from "zod";
import { ErrorCodes, ErrorSeverity, VoiceAgentError } from "../utils/error";
import { LogLevel } from "../services/logging/LoggingService";

export const DEFAULT_GROQ_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_ORDER_DATA_PATH = "data/store.json";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  FRONTEND_URL: z.string().min(1).default("*"),
  GROQ_API_KEY: z.string().trim().min(1).optional().catch(undefined),
  GROQ_BASE_URL: z.string().url().default(DEFAULT_GROQ_BASE_URL),
  GROQ_STT_MODEL: z.string().min(1).default("whisper-large-v3-turbo"),
  GROQ_LLM_MODEL: z.string().min(1).default("llama-3.3-70b-versatile"),
  GROQ_TTS_MODEL: z.string().min(1).default("playai-tts"),
  GROQ_TTS_VOICE: z.string().min(1).default("Celeste-PlayAI"),
  ORDER_DATA_PATH: z.string().min(1).default(DEFAULT_ORDER_DATA_PATH),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export interface BackendConfig {
  apiKey?: string;
  baseURL: string;
  sttModel: string;
  llmModel: string;
  ttsModel: string;
  ttsVoice: string;
}

export interface AppConfig {
  port: number;
  frontendUrl: string;
  orderDataPath: string;
  logLevel: LogLevel;
  nodeEnv: "development" | "production" | "test";
  backend: BackendConfig;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new VoiceAgentError(
      "Invalid environment configuration",
      ErrorCodes.INVALID_CONFIGURATION,
      ErrorSeverity.CRITICAL,
      {
        component: "Config",
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      }
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    frontendUrl: vars.FRONTEND_URL,
    orderDataPath: vars.ORDER_DATA_PATH,
    logLevel: vars.LOG_LEVEL,
    nodeEnv: vars.NODE_ENV,
    backend: {
      apiKey: vars.GROQ_API_KEY,
      baseURL: vars.GROQ_BASE_URL,
      sttModel: vars.GROQ_STT_MODEL,
      llmModel: vars.GROQ_LLM_MODEL,
      ttsModel: vars.GROQ_TTS_MODEL,
      ttsVoice: vars.GROQ_TTS_VOICE,
    },
  };
}
