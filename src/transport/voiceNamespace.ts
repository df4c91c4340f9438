import { VoiceSession } from "../core/VoiceSession";
import type { AudioFrame, OrderReader } from "../types";
import type { SessionTransport } from "../processors/OutputTransportProcessor";
import type { BackendFactory } from "../services/groq/backends";
import type { TranscriptHub } from "../services/transcription/TranscriptHub";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import { VoiceAgentError, describeError } from "../utils/error";
import { deserializeAudio, serializeAudio } from "./JsonFrameSerializer";
import { CLOSE_CODES, ConnectionRefusedError } from "./events";
import type { SessionErrorPayload, VoiceServer, VoiceSocket } from "./events";

export const VOICE_NAMESPACE = "/voice";

export interface VoiceNamespaceDeps {
  hub: TranscriptHub;
  // Unset when the order store failed to load
  orders?: OrderReader;
  // Unset when no API key is configured
  backends?: BackendFactory;
}

export interface VoiceConnectionOptions {
  session: VoiceSession;
  reportError: (error: SessionErrorPayload) => void;
  disconnect: () => void;
}

/**
 * Binds one client connection to its voice session. Inbound events become
 * pipeline frames; a terminated pipeline is reported to the client before
 * the connection is dropped.
 */
export class VoiceConnection {
  private readonly logger = LoggingService.getInstance();

  constructor(private readonly options: VoiceConnectionOptions) {
    options.session.on("terminated", (error) => {
      this.options.reportError({
        code: CLOSE_CODES.INTERNAL_ERROR,
        message: error.message,
      });
      this.options.disconnect();
    });
  }

  get session(): VoiceSession {
    return this.options.session;
  }

  async open(): Promise<void> {
    await this.session.start();
  }

  async onAudio(payload: unknown): Promise<void> {
    let frame: AudioFrame;
    try {
      frame = deserializeAudio(payload);
    } catch (error) {
      this.logger.log(LogLevel.WARN, "Ignoring invalid audio payload", "VoiceConnection", {
        sessionId: this.session.id,
        error: describeError(error),
        ...(error instanceof VoiceAgentError ? { issues: error.metadata.issues } : {}),
      });
      return;
    }
    await this.session.pushFrame(frame);
  }

  async onUserStartedSpeaking(): Promise<void> {
    await this.session.userStartedSpeaking();
  }

  async onUserStoppedSpeaking(): Promise<void> {
    await this.session.userStoppedSpeaking();
  }

  async onDisconnect(reason: string): Promise<void> {
    this.logger.log(LogLevel.INFO, "Voice client disconnected", "VoiceConnection", {
      sessionId: this.session.id,
      reason,
    });
    await this.session.close();
  }
}

function socketTransport(socket: VoiceSocket): SessionTransport {
  return {
    sendAudio: (frame) => {
      socket.emit("audio", serializeAudio(frame));
    },
    sendMessage: (payload) => {
      socket.emit("message", payload);
    },
  };
}

function reportFailure(sessionId: string, action: string) {
  return (error: unknown) => {
    LoggingService.getInstance().log(LogLevel.ERROR, `Failed to ${action}`, "VoiceNamespace", {
      sessionId,
      error: describeError(error),
    });
  };
}

/**
 * Handshake middleware that refuses voice clients while a dependency is
 * missing, so they fail at once with a distinct code instead of timing out.
 */
export function refuseWhenUnavailable(deps: VoiceNamespaceDeps) {
  const logger = LoggingService.getInstance();

  return (socket: { id: string }, next: (error?: Error) => void): void => {
    if (!deps.backends) {
      logger.log(LogLevel.WARN, "Refusing voice session: GROQ_API_KEY is not set", "VoiceNamespace", {
        socketId: socket.id,
      });
      return next(new ConnectionRefusedError("Speech backend is not configured"));
    }
    if (!deps.orders) {
      logger.log(LogLevel.WARN, "Refusing voice session: order store unavailable", "VoiceNamespace", {
        socketId: socket.id,
      });
      return next(new ConnectionRefusedError("Order store is unavailable"));
    }
    next();
  };
}

export function registerVoiceNamespace(io: VoiceServer, deps: VoiceNamespaceDeps): void {
  const logger = LoggingService.getInstance();
  const voice = io.of(VOICE_NAMESPACE);

  voice.use(refuseWhenUnavailable(deps));

  voice.on("connection", (socket) => {
    const { backends, orders } = deps;
    if (!backends || !orders) {
      socket.disconnect(true);
      return;
    }

    const session = new VoiceSession({
      transport: socketTransport(socket),
      hub: deps.hub,
      orders,
      backends,
    });
    socket.data.sessionId = session.id;
    logger.log(LogLevel.INFO, "Voice client connected", "VoiceNamespace", {
      socketId: socket.id,
      sessionId: session.id,
    });

    const connection = new VoiceConnection({
      session,
      reportError: (error) => {
        socket.emit("sessionError", error);
      },
      disconnect: () => {
        socket.disconnect(true);
      },
    });

    socket.on("audio", (payload) => {
      connection.onAudio(payload).catch(reportFailure(session.id, "queue audio"));
    });
    socket.on("userStartedSpeaking", () => {
      connection.onUserStartedSpeaking().catch(reportFailure(session.id, "queue speech start"));
    });
    socket.on("userStoppedSpeaking", () => {
      connection.onUserStoppedSpeaking().catch(reportFailure(session.id, "queue speech stop"));
    });
    socket.on("disconnect", (reason) => {
      connection.onDisconnect(reason).catch(reportFailure(session.id, "close session"));
    });

    connection.open().catch((error: unknown) => {
      reportFailure(session.id, "start session")(error);
      socket.emit("sessionError", {
        code: CLOSE_CODES.INTERNAL_ERROR,
        message: "Session failed to start",
      });
      socket.disconnect(true);
    });
  });
}
