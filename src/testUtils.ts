import { FrameProcessor } from "./core/FrameProcessor";
import type { ProcessorOutput } from "./core/FrameProcessor";
import type { BackendFactory } from "./services/groq/backends";
import type { SessionTransport } from "./processors/OutputTransportProcessor";
import type { AudioFrame, Emission, Frame, JsonValue } from "./types";
import {
  FrameDirection,
  audioFrame,
  isLifecycle,
  lifecycleFrame,
  textFrame,
} from "./types";

export async function collect(output: ProcessorOutput): Promise<Emission[]> {
  const emissions: Emission[] = [];
  for await (const emission of output) {
    emissions.push(emission);
  }
  return emissions;
}

export function describeFrame(frame: Frame): string {
  switch (frame.kind) {
    case "lifecycle":
      return frame.event;
    case "text":
      return `text:${frame.text}`;
    default:
      return frame.kind;
  }
}

export class RecordingTransport implements SessionTransport {
  audio: AudioFrame[] = [];
  messages: JsonValue[] = [];

  sendAudio(frame: AudioFrame): void {
    this.audio.push(frame);
  }

  sendMessage(payload: JsonValue): void {
    this.messages.push(payload);
  }
}

// Consumes audio and "transcribes" each utterance to the next scripted line
export class ScriptedSTT extends FrameProcessor {
  readonly name = "ScriptedSTT";

  constructor(private readonly transcripts: string[]) {
    super();
  }

  *handle(frame: Frame, direction: FrameDirection): Iterable<Emission> {
    if (frame.kind === "audio" && direction === FrameDirection.DOWNSTREAM) return;
    yield { frame, direction };

    if (isLifecycle(frame, "user-stopped-speaking")) {
      const transcript = this.transcripts.shift();
      if (transcript) yield this.downstream(textFrame(transcript));
    }
  }
}

export class FailingSTT extends FrameProcessor {
  readonly name = "FailingSTT";

  *handle(frame: Frame, direction: FrameDirection): Iterable<Emission> {
    if (isLifecycle(frame, "user-stopped-speaking")) {
      throw new Error("decoder crashed");
    }
    yield { frame, direction };
  }
}

export class ScriptedLLM extends FrameProcessor {
  readonly name = "ScriptedLLM";

  constructor(private readonly chunks: string[]) {
    super();
  }

  *handle(frame: Frame, direction: FrameDirection): Iterable<Emission> {
    if (frame.kind !== "llm-request") {
      yield { frame, direction };
      return;
    }
    yield this.downstream(lifecycleFrame("response-start"));
    for (const chunk of this.chunks) {
      yield this.downstream(textFrame(chunk));
    }
    yield this.downstream(lifecycleFrame("response-end"));
  }
}

// Emits one silent audio chunk ahead of every response end
export class SilentTTS extends FrameProcessor {
  readonly name = "SilentTTS";

  *handle(frame: Frame, direction: FrameDirection): Iterable<Emission> {
    if (isLifecycle(frame, "response-end") && direction === FrameDirection.DOWNSTREAM) {
      yield this.downstream(audioFrame(Buffer.alloc(320), 16000, 1));
    }
    yield { frame, direction };
  }
}

export function scriptedBackends(
  transcripts: string[],
  reply: string[]
): BackendFactory {
  return () => ({
    stt: new ScriptedSTT(transcripts),
    llm: new ScriptedLLM(reply),
    tts: new SilentTTS(),
  });
}
