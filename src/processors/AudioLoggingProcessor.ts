import { FrameProcessor } from "../core/FrameProcessor";
import type { Emission, Frame } from "../types";
import { FrameDirection } from "../types";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";

const LOG_EVERY_CHUNKS = 50;

export class AudioLoggingProcessor extends FrameProcessor {
  readonly name = "AudioLoggingProcessor";
  private chunkCount = 0;
  private totalBytes = 0;
  private logger = LoggingService.getInstance();

  constructor(private readonly sessionId: string) {
    super();
  }

  getStats(): { chunks: number; bytes: number } {
    return { chunks: this.chunkCount, bytes: this.totalBytes };
  }

  handle(frame: Frame, direction: FrameDirection): Emission[] {
    if (frame.kind === "audio" && direction === FrameDirection.DOWNSTREAM) {
      this.chunkCount++;
      this.totalBytes += frame.audio.byteLength;

      if (this.chunkCount % LOG_EVERY_CHUNKS === 1) {
        this.logger.log(LogLevel.INFO, "Receiving audio from client", this.name, {
          sessionId: this.sessionId,
          chunk: this.chunkCount,
          bytes: frame.audio.byteLength,
          sampleRate: frame.sampleRate,
          totalKb: (this.totalBytes / 1024).toFixed(2),
        });
      }
    }
    return this.forward(frame, direction);
  }
}
