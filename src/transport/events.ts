import type { Server, Socket } from "socket.io";
import type { JsonValue } from "../types";
import type { OutboundAudioPayload } from "./JsonFrameSerializer";

export const CLOSE_CODES = {
  NORMAL: 1000,
  INTERNAL_ERROR: 1011,
} as const;

export interface SessionErrorPayload {
  code: number;
  message: string;
}

// Client → server, across /voice and /transcription
export interface ClientToServerEvents {
  audio: (payload: unknown) => void;
  userStartedSpeaking: () => void;
  userStoppedSpeaking: () => void;
}

// Server → client, across /voice and /transcription
export interface ServerToClientEvents {
  audio: (payload: OutboundAudioPayload) => void;
  message: (payload: JsonValue) => void;
  sessionError: (error: SessionErrorPayload) => void;
  transcription: (payload: string) => void;
}

export type InterServerEvents = Record<string, never>;

export interface SocketData {
  sessionId?: string;
}

export type VoiceServer = Server<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

export type VoiceSocket = Socket<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

/** Handshake refusal; the client receives `data` on `connect_error`. */
export class ConnectionRefusedError extends Error {
  readonly data: SessionErrorPayload;

  constructor(message: string, code: number = CLOSE_CODES.INTERNAL_ERROR) {
    super(message);
    this.name = "ConnectionRefusedError";
    this.data = { code, message };
  }
}
