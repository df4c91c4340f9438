import type { LLMContextWriter } from "./LLMContext";

/**
 * Remembers the last system message injected per tag so an identical fact
 * is never appended twice in a row.
 */
export class SystemFactLedger {
  private facts = new Map<string, string>();

  constructor(private readonly context: LLMContextWriter) {}

  /** Returns true when a system message was appended. */
  inject(tag: string, content: string): boolean {
    if (this.facts.get(tag) === content) return false;

    this.context.appendMessage("system", content);
    this.facts.set(tag, content);
    return true;
  }

  get(tag: string): string | undefined {
    return this.facts.get(tag);
  }
}
