export enum FrameDirection {
  DOWNSTREAM = "downstream",
  UPSTREAM = "upstream",
}

export type LifecycleEvent =
  | "session-start"
  | "session-end"
  | "user-started-speaking"
  | "user-stopped-speaking"
  | "bot-started-speaking"
  | "bot-stopped-speaking"
  | "response-start"
  | "response-end";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// Raw PCM16 audio
export interface AudioFrame {
  kind: "audio";
  audio: Buffer;
  sampleRate: number;
  channels: number;
}

export interface TextFrame {
  kind: "text";
  text: string;
}

export interface LifecycleFrame {
  kind: "lifecycle";
  event: LifecycleEvent;
}

// Outbound message for the session client
export interface TransportMessageFrame {
  kind: "transport-message";
  payload: JsonValue;
}

// Asks the LLM stage to run a completion over the current context
export interface LLMRequestFrame {
  kind: "llm-request";
}

export type Frame =
  | AudioFrame
  | TextFrame
  | LifecycleFrame
  | TransportMessageFrame
  | LLMRequestFrame;

export interface Emission {
  frame: Frame;
  direction: FrameDirection;
}

export const audioFrame = (
  audio: Buffer,
  sampleRate: number,
  channels: number
): AudioFrame => ({ kind: "audio", audio, sampleRate, channels });

export const textFrame = (text: string): TextFrame => ({ kind: "text", text });

export const lifecycleFrame = (event: LifecycleEvent): LifecycleFrame => ({
  kind: "lifecycle",
  event,
});

export const transportMessage = (
  payload: JsonValue
): TransportMessageFrame => ({ kind: "transport-message", payload });

export const llmRequestFrame = (): LLMRequestFrame => ({ kind: "llm-request" });

export const isLifecycle = (
  frame: Frame,
  event: LifecycleEvent
): frame is LifecycleFrame =>
  frame.kind === "lifecycle" && frame.event === event;
