import type {
  Speaker,
  TranscriptEntry,
  TranscriptSubscriber,
} from "../../types";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import { describeError } from "../../utils/error";

// A type alias so entries stay assignable to JSON payloads
export type SerializedTranscriptEntry = {
  speaker: Speaker;
  text: string;
  timestamp: string;
};

/**
 * Live transcript shared by every voice session and every observer.
 *
 * One instance per process, created by the server and handed to the
 * sessions and the observer namespace. Mutations run synchronously so they
 * never interleave; deliveries fan out afterwards on a snapshot. The
 * transcript is dropped as soon as the last observer leaves.
 */
export class TranscriptHub {
  private entries: TranscriptEntry[] = [];
  private subscribers = new Set<TranscriptSubscriber>();
  private deliveries = new Set<Promise<void>>();
  private logger = LoggingService.getInstance();

  constructor(private readonly now: () => Date = () => new Date()) {}

  addMessage(speaker: Speaker, text: string): TranscriptEntry {
    const entry: TranscriptEntry = { speaker, text, timestamp: this.now() };
    this.entries.push(entry);

    if (this.subscribers.size > 0) {
      const payload = this.serialize();
      const targets = [...this.subscribers];
      this.track(
        Promise.allSettled(targets.map((subscriber) => this.deliver(subscriber, payload)))
          .then(() => undefined)
      );
    }
    return entry;
  }

  subscribe(subscriber: TranscriptSubscriber): void {
    this.subscribers.add(subscriber);
    this.logger.log(LogLevel.INFO, "Transcript subscriber connected", "TranscriptHub", {
      subscriberId: subscriber.id,
      subscribers: this.subscribers.size,
    });

    if (this.entries.length > 0) {
      this.track(this.deliver(subscriber, this.serialize()));
    }
  }

  unsubscribe(subscriber: TranscriptSubscriber): void {
    this.subscribers.delete(subscriber);
    this.logger.log(LogLevel.INFO, "Transcript subscriber disconnected", "TranscriptHub", {
      subscriberId: subscriber.id,
      subscribers: this.subscribers.size,
    });

    if (this.subscribers.size === 0) {
      this.entries = [];
    }
  }

  getEntries(): TranscriptEntry[] {
    return [...this.entries];
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  snapshot(): SerializedTranscriptEntry[] {
    return this.entries.map((entry) => ({
      speaker: entry.speaker,
      text: entry.text,
      timestamp: entry.timestamp.toISOString(),
    }));
  }

  serialize(): string {
    return JSON.stringify(this.snapshot());
  }

  /** Waits for every delivery started so far. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.deliveries]);
  }

  private async deliver(
    subscriber: TranscriptSubscriber,
    payload: string
  ): Promise<void> {
    if (!this.subscribers.has(subscriber)) return;

    try {
      await subscriber.send(payload);
    } catch (error) {
      this.subscribers.delete(subscriber);
      this.logger.log(
        LogLevel.WARN,
        "Removing transcript subscriber after failed delivery",
        "TranscriptHub",
        { subscriberId: subscriber.id, error: describeError(error) }
      );
    }
  }

  private track(delivery: Promise<void>): void {
    const tracked: Promise<void> = delivery.finally(() => {
      this.deliveries.delete(tracked);
    });
    this.deliveries.add(tracked);
  }
}
