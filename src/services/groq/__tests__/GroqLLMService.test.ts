import { beforeEach, describe, expect, it, vi } from "vitest";
import OpenAI from "openai";
import { GroqLLMService } from "../GroqLLMService";
import { LLMContext } from "../../../core/LLMContext";
import { APOLOGY_MESSAGES } from "../../../config/prompts";
import type { Frame } from "../../../types";
import { FrameDirection, llmRequestFrame, textFrame } from "../../../types";
import { collect, describeFrame } from "../../../testUtils";

// Hoist mocks
const mocks = vi.hoisted(() => ({
  complete: vi.fn(),
}));

vi.mock("openai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("openai")>();
  class MockOpenAI {
    chat = { completions: { create: mocks.complete } };
  }
  return { ...actual, default: MockOpenAI, OpenAI: MockOpenAI };
});

async function* chunks(parts: string[], failAfter?: number) {
  for (const [index, part] of parts.entries()) {
    if (index === failAfter) throw new Error("stream reset");
    yield { choices: [{ delta: { content: part } }] };
  }
}

describe("GroqLLMService", () => {
  let context: LLMContext;
  let llm: GroqLLMService;

  const send = async (frame: Frame, direction: FrameDirection = FrameDirection.DOWNSTREAM) =>
    (await collect(llm.handle(frame, direction))).map((emission) =>
      emission.frame.kind === "transport-message"
        ? emission.frame.payload
        : describeFrame(emission.frame)
    );

  beforeEach(() => {
    mocks.complete.mockReset();
    context = new LLMContext([{ role: "system", content: "You are a store assistant." }]);
    context.appendMessage("user", "where is order 1003");
    llm = new GroqLLMService(new OpenAI({ apiKey: "test-key" }), context, {
      model: "llama-3.3-70b-versatile",
    });
  });

  it("streams the completion between response markers", async () => {
    mocks.complete.mockResolvedValue(chunks(["It has ", "", "shipped."]));

    await expect(send(llmRequestFrame())).resolves.toEqual([
      "response-start",
      "text:It has ",
      "text:shipped.",
      "response-end",
    ]);
    expect(mocks.complete).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "llama-3.3-70b-versatile",
        stream: true,
        messages: [
          { role: "system", content: "You are a store assistant." },
          { role: "user", content: "where is order 1003" },
        ],
      })
    );
  });

  it("apologises when the request fails", async () => {
    mocks.complete.mockRejectedValue(new Error("401 Unauthorized"));

    await expect(send(llmRequestFrame())).resolves.toEqual([
      "response-start",
      { type: "error", message: APOLOGY_MESSAGES.completion },
      "response-end",
    ]);
  });

  it("keeps what was streamed before the stream broke", async () => {
    mocks.complete.mockResolvedValue(chunks(["It has ", "shipped."], 1));

    await expect(send(llmRequestFrame())).resolves.toEqual([
      "response-start",
      "text:It has ",
      { type: "error", message: APOLOGY_MESSAGES.completion },
      "response-end",
    ]);
  });

  it("forwards every other frame", async () => {
    await expect(send(textFrame("hi"))).resolves.toEqual(["text:hi"]);
    await expect(send(llmRequestFrame(), FrameDirection.UPSTREAM)).resolves.toEqual([
      "llm-request",
    ]);
    expect(mocks.complete).not.toHaveBeenCalled();
  });
});
