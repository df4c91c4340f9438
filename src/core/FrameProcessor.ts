import type { Emission, Frame } from "../types";
import { FrameDirection } from "../types";

export type ProcessorOutput = Iterable<Emission> | AsyncIterable<Emission>;

/**
 * A single pipeline stage.
 *
 * `handle` yields every frame that continues through the pipeline,
 * including the observed one. Stages ignore kinds they do not handle by
 * forwarding them unchanged.
 */
export abstract class FrameProcessor {
  abstract readonly name: string;

  abstract handle(frame: Frame, direction: FrameDirection): ProcessorOutput;

  async setup(): Promise<void> {}

  async cleanup(): Promise<void> {}

  protected forward(frame: Frame, direction: FrameDirection): Emission[] {
    return [{ frame, direction }];
  }

  protected downstream(frame: Frame): Emission {
    return { frame, direction: FrameDirection.DOWNSTREAM };
  }

  protected upstream(frame: Frame): Emission {
    return { frame, direction: FrameDirection.UPSTREAM };
  }
}
