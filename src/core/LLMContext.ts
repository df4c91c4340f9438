import type { Message } from "../types";

export interface LLMContextWriter {
  appendMessage(role: Message["role"], content: string): void;
}

/**
 * Conversation history shared by the context aggregators, the order
 * knowledge processor and the LLM stage of one session.
 */
export class LLMContext implements LLMContextWriter {
  private messages: Message[];

  constructor(initialMessages: Message[] = []) {
    this.messages = [...initialMessages];
  }

  appendMessage(role: Message["role"], content: string): void {
    this.messages.push({ role, content });
  }

  getMessages(): Message[] {
    return [...this.messages];
  }
}
