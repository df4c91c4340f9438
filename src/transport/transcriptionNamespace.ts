import type { TranscriptHub } from "../services/transcription/TranscriptHub";
import type { TranscriptSubscriber } from "../types";
import type { VoiceServer, VoiceSocket } from "./events";

export const TRANSCRIPTION_NAMESPACE = "/transcription";

export interface ObserverConnection {
  id: string;
  connected: boolean;
  emit(event: "transcription", payload: string): unknown;
}

// Delivery fails once the observer has gone so the hub drops it
export function observerSubscriber(connection: ObserverConnection): TranscriptSubscriber {
  return {
    id: connection.id,
    send: async (payload) => {
      if (!connection.connected) {
        throw new Error(`Observer ${connection.id} is disconnected`);
      }
      connection.emit("transcription", payload);
    },
  };
}

/** Subscribes an observer to the hub; the returned function detaches it. */
export function attachObserver(
  hub: TranscriptHub,
  connection: ObserverConnection
): () => void {
  const subscriber = observerSubscriber(connection);
  hub.subscribe(subscriber);
  return () => hub.unsubscribe(subscriber);
}

export function registerTranscriptionNamespace(
  io: VoiceServer,
  hub: TranscriptHub
): void {
  io.of(TRANSCRIPTION_NAMESPACE).on("connection", (socket: VoiceSocket) => {
    const detach = attachObserver(hub, {
      id: socket.id,
      get connected() {
        return socket.connected;
      },
      emit: (event, payload) => socket.emit(event, payload),
    });
    socket.on("disconnect", detach);
  });
}
