import { FrameProcessor } from "../core/FrameProcessor";
import type { LLMContextWriter } from "../core/LLMContext";
import { SystemFactLedger } from "../core/SystemFactLedger";
import type { Emission, Frame, OrderReader } from "../types";
import { FrameDirection } from "../types";
import {
  ASK_FOR_ORDER_NUMBER_PROMPT,
  ORDER_STATUS_HINTS,
  orderLookupPrompt,
  orderNotFoundPrompt,
} from "../config/prompts";
import {
  detectOrderIntent,
  extractOrderNumber,
} from "../services/order/orderIntent";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";

export const ORDER_LOOKUP_TAG = "order-lookup";
export const ORDER_NOT_FOUND_TAG = "order-not-found";
export const ORDER_KNOWLEDGE_BASE_TAG = "order-knowledge-base";

/**
 * Watches transcribed user text for order status questions and feeds the
 * matching store data to the LLM as system messages. The text itself is
 * always forwarded untouched.
 */
export class OrderKnowledgeProcessor extends FrameProcessor {
  readonly name = "OrderKnowledgeProcessor";
  private awaitingOrderNumber = false;
  private lastDetectedOrderNumber?: string;
  private facts: SystemFactLedger;
  private logger = LoggingService.getInstance();

  constructor(
    context: LLMContextWriter,
    private readonly orders: OrderReader
  ) {
    super();
    this.facts = new SystemFactLedger(context);
  }

  isAwaitingOrderNumber(): boolean {
    return this.awaitingOrderNumber;
  }

  getLastDetectedOrderNumber(): string | undefined {
    return this.lastDetectedOrderNumber;
  }

  handle(frame: Frame, direction: FrameDirection): Emission[] {
    if (frame.kind === "text" && direction === FrameDirection.DOWNSTREAM) {
      this.inspect(frame.text);
    }
    return this.forward(frame, direction);
  }

  private inspect(rawText: string): void {
    const text = rawText.trim();
    if (!text) return;

    const orderNumber = extractOrderNumber(text);
    this.logger.log(LogLevel.DEBUG, "Inspected transcription", this.name, {
      text,
      orderNumber,
    });

    if (orderNumber) {
      if (orderNumber !== this.lastDetectedOrderNumber) {
        this.lastDetectedOrderNumber = orderNumber;
        this.lookUp(orderNumber);
      }
      return;
    }

    if (detectOrderIntent(text) && !this.awaitingOrderNumber) {
      this.awaitingOrderNumber = true;
      this.facts.inject(ORDER_KNOWLEDGE_BASE_TAG, ASK_FOR_ORDER_NUMBER_PROMPT);
    }
  }

  private lookUp(orderNumber: string): void {
    const order = this.orders.getOrder(Number.parseInt(orderNumber, 10));

    if (!order) {
      this.logger.log(LogLevel.INFO, "Order not found", this.name, { orderNumber });
      this.facts.inject(ORDER_NOT_FOUND_TAG, orderNotFoundPrompt(orderNumber));
      return;
    }

    this.awaitingOrderNumber = false;
    const details = this.orders.formatOrderDetails(order);
    const toneHint = `Order ${order.id} ${ORDER_STATUS_HINTS[order.status]}`;
    this.logger.log(LogLevel.INFO, "Order found", this.name, {
      orderNumber,
      status: order.status,
    });
    this.facts.inject(ORDER_LOOKUP_TAG, orderLookupPrompt(orderNumber, details, toneHint));
  }
}
