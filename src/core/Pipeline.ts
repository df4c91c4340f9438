import { EventEmitter } from "events";
import type { FrameProcessor } from "./FrameProcessor";
import type { Frame } from "../types";
import { FrameDirection, lifecycleFrame } from "../types";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import { PipelineTerminatedError, describeError } from "../utils/error";

export type PipelineStatus =
  | "idle"
  | "running"
  | "stopping"
  | "stopped"
  | "terminated";

export interface PipelineEvents {
  terminated: (error: PipelineTerminatedError) => void;
  stopped: () => void;
}

/**
 * Runs frames through an ordered list of processors.
 *
 * Downstream frames enter at the first processor and travel toward the
 * last; upstream frames travel the other way. Every emission is routed to
 * its neighbour before the emitting processor produces the next one.
 * Input is serialized: a queued frame starts only after the previous one
 * has left the pipeline.
 */
export class Pipeline extends EventEmitter {
  private status: PipelineStatus = "idle";
  private tail: Promise<unknown> = Promise.resolve();
  private cleanup?: Promise<void>;
  private logger: LoggingService;

  constructor(
    private readonly processors: FrameProcessor[],
    private readonly sessionId: string = "unknown"
  ) {
    super();
    this.logger = LoggingService.getInstance();
  }

  getStatus(): PipelineStatus {
    return this.status;
  }

  async start(): Promise<void> {
    if (this.status !== "idle") return;

    for (const processor of this.processors) {
      await processor.setup();
    }
    // stop() may have run while a processor was setting up
    if (this.status !== "idle") return;
    this.status = "running";
    this.logger.log(LogLevel.INFO, "Pipeline started", "Pipeline", {
      sessionId: this.sessionId,
      processors: this.processors.map((p) => p.name),
    });
    await this.enqueue(lifecycleFrame("session-start"), FrameDirection.DOWNSTREAM);
  }

  /**
   * Resolves to true once the frame has left the pipeline, false when the
   * frame was refused (pipeline not running) or a stage failed on it.
   * Never rejects; stage failures surface through the `terminated` event.
   */
  queueFrame(
    frame: Frame,
    direction: FrameDirection = FrameDirection.DOWNSTREAM
  ): Promise<boolean> {
    if (this.status !== "running") {
      this.logger.log(LogLevel.DEBUG, "Frame refused", "Pipeline", {
        sessionId: this.sessionId,
        status: this.status,
        kind: frame.kind,
      });
      return Promise.resolve(false);
    }
    return this.enqueue(frame, direction);
  }

  async stop(): Promise<void> {
    if (this.status === "running") {
      this.status = "stopping";
      await this.enqueue(lifecycleFrame("session-end"), FrameDirection.DOWNSTREAM);
    }
    await this.tail;

    this.cleanup ??= this.runCleanup();
    await this.cleanup;

    if (this.status !== "terminated" && this.status !== "stopped") {
      this.status = "stopped";
      this.emit("stopped");
    }
  }

  private enqueue(frame: Frame, direction: FrameDirection): Promise<boolean> {
    const entry =
      direction === FrameDirection.DOWNSTREAM ? 0 : this.processors.length - 1;
    const run = this.tail.then(() => this.process(frame, direction, entry));
    this.tail = run;
    return run;
  }

  private async process(
    frame: Frame,
    direction: FrameDirection,
    entry: number
  ): Promise<boolean> {
    if (this.status === "terminated") return false;

    try {
      await this.route(frame, direction, entry);
      return true;
    } catch (error) {
      this.terminate(
        error instanceof PipelineTerminatedError
          ? error
          : new PipelineTerminatedError("unknown", error, this.sessionId)
      );
      return false;
    }
  }

  private async route(
    frame: Frame,
    direction: FrameDirection,
    index: number
  ): Promise<void> {
    // Past either end the frame leaves the pipeline
    if (index < 0 || index >= this.processors.length) return;

    const processor = this.processors[index];
    try {
      for await (const emission of processor.handle(frame, direction)) {
        const next =
          emission.direction === FrameDirection.DOWNSTREAM ? index + 1 : index - 1;
        await this.route(emission.frame, emission.direction, next);
      }
    } catch (error) {
      if (error instanceof PipelineTerminatedError) throw error;
      throw new PipelineTerminatedError(processor.name, error, this.sessionId);
    }
  }

  private terminate(error: PipelineTerminatedError): void {
    if (this.status === "terminated") return;
    this.status = "terminated";
    this.logger.error(error);
    this.emit("terminated", error);
  }

  private async runCleanup(): Promise<void> {
    const results = await Promise.allSettled(
      this.processors.map((processor) => processor.cleanup())
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.log(LogLevel.WARN, "Processor cleanup failed", "Pipeline", {
          sessionId: this.sessionId,
          processor: this.processors[index].name,
          error: describeError(result.reason),
        });
      }
    });
  }

  public on<K extends keyof PipelineEvents>(
    event: K,
    listener: PipelineEvents[K]
  ): this {
    return super.on(event, listener);
  }

  public emit<K extends keyof PipelineEvents>(
    event: K,
    ...args: Parameters<PipelineEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
