import { createServer } from "http";
import { Server } from "socket.io";
import { config } from "dotenv";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { OrderService } from "./services/order/OrderService";
import { TranscriptHub } from "./services/transcription/TranscriptHub";
import { createGroqBackends } from "./services/groq/backends";
import type { BackendFactory } from "./services/groq/backends";
import { LoggingService, LogLevel } from "./services/logging/LoggingService";
import { registerVoiceNamespace } from "./transport/voiceNamespace";
import { registerTranscriptionNamespace } from "./transport/transcriptionNamespace";
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
} from "./transport/events";
import { VoiceAgentError, describeError } from "./utils/error";

// Load environment variables
config();

const appConfig = loadConfig();
const logger = LoggingService.getInstance();
logger.setLevel(appConfig.logLevel);

// The server still starts without these; voice sessions are refused instead
let orders: OrderService | undefined;
try {
  orders = await OrderService.fromFile(appConfig.orderDataPath);
} catch (error) {
  if (!(error instanceof VoiceAgentError)) throw error;
  logger.error(error, "Server");
}

let backends: BackendFactory | undefined;
try {
  backends = createGroqBackends(appConfig.backend);
} catch (error) {
  if (!(error instanceof VoiceAgentError)) throw error;
  logger.error(error, "Server");
}

const hub = new TranscriptHub();
const app = createApp(appConfig);
const httpServer = createServer(app);

const io = new Server<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>(httpServer, {
  cors: {
    origin: appConfig.frontendUrl,
    methods: ["GET", "POST"],
  },
  pingInterval: 25000,
  pingTimeout: 60000,
});

registerVoiceNamespace(io, { hub, orders, backends });
registerTranscriptionNamespace(io, hub);

httpServer.listen(appConfig.port, () => {
  logger.log(LogLevel.INFO, `Server running on port ${appConfig.port}`, "Server", {
    voiceEnabled: Boolean(orders && backends),
  });
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.log(LogLevel.INFO, `Received ${signal}, shutting down`, "Server");

  // Closing socket.io disconnects every client, which closes their sessions
  await io.close();
  await hub.flush();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.log(LogLevel.ERROR, "Shutdown failed", "Server", {
        error: describeError(error),
      });
      process.exit(1);
    });
  });
}
