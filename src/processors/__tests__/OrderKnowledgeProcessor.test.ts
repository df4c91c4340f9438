import { beforeEach, describe, expect, it } from "vitest";
import { OrderKnowledgeProcessor } from "../OrderKnowledgeProcessor";
import { LLMContext } from "../../core/LLMContext";
import { OrderService } from "../../services/order/OrderService";
import type { StoreSnapshot } from "../../services/order/OrderService";
import {
  ASK_FOR_ORDER_NUMBER_PROMPT,
  ORDER_STATUS_HINTS,
  orderNotFoundPrompt,
} from "../../config/prompts";
import { FrameDirection, textFrame } from "../../types";

const snapshot: StoreSnapshot = {
  products: [
    { id: 1, name: "Wireless Headphones", price: 129.99, stock_quantity: 4, sku: "AUD-1" },
    { id: 2, name: "USB-C Cable", price: 12.5, stock_quantity: 40, sku: "ACC-2" },
  ],
  orders: [
    {
      id: 1003,
      customer_id: 7,
      order_date: "2024-05-02T14:30:00",
      total_amount: 150,
      status: "shipped",
    },
  ],
  order_items: [
    { order_id: 1003, product_id: 1, quantity: 1, unit_price: 129.99 },
    { order_id: 1003, product_id: 2, quantity: 2, unit_price: 12.5 },
  ],
};

describe("OrderKnowledgeProcessor", () => {
  let context: LLMContext;
  let processor: OrderKnowledgeProcessor;

  const say = (text: string) =>
    processor.handle(textFrame(text), FrameDirection.DOWNSTREAM);

  beforeEach(() => {
    context = new LLMContext();
    processor = new OrderKnowledgeProcessor(context, new OrderService(snapshot));
  });

  it("asks for an order number, then injects the order once it is given", () => {
    say("what's my order status");

    expect(processor.isAwaitingOrderNumber()).toBe(true);
    expect(context.getMessages()).toEqual([
      { role: "system", content: ASK_FOR_ORDER_NUMBER_PROMPT },
    ]);

    say("order number is 1003");

    expect(processor.isAwaitingOrderNumber()).toBe(false);
    expect(processor.getLastDetectedOrderNumber()).toBe("1003");
    const messages = context.getMessages();
    expect(messages).toHaveLength(2);
    expect(messages[1].role).toBe("system");
    expect(messages[1].content).toContain(
      "Order lookup result for order number 1003:\nOrder #1003 Details:"
    );
    expect(messages[1].content).toContain("- Status: shipped");
    expect(messages[1].content).toContain(
      `Hint for tone: Order 1003 ${ORDER_STATUS_HINTS.shipped}`
    );
  });

  it("does not repeat the prompt while still waiting for a number", () => {
    say("what's my order status");
    say("can you check the status of my order");

    expect(context.getMessages()).toHaveLength(1);
  });

  it("does not look up the same number twice in a row", () => {
    say("order 1003");
    say("yes, order 1003");

    expect(context.getMessages()).toHaveLength(1);
  });

  it("tells the model when an order does not exist", () => {
    say("my order number is 4242");

    expect(context.getMessages()).toEqual([
      { role: "system", content: orderNotFoundPrompt("4242") },
    ]);
    expect(processor.isAwaitingOrderNumber()).toBe(false);
  });

  it("keeps waiting for a valid number after a miss", () => {
    say("what's my order status");
    say("it's 4242");

    expect(processor.isAwaitingOrderNumber()).toBe(true);
    expect(context.getMessages().map((message) => message.content)).toEqual([
      ASK_FOR_ORDER_NUMBER_PROMPT,
      orderNotFoundPrompt("4242"),
    ]);
  });

  it("forwards every frame unchanged", () => {
    const frame = textFrame("order 1003");

    expect(processor.handle(frame, FrameDirection.DOWNSTREAM)).toEqual([
      { frame, direction: FrameDirection.DOWNSTREAM },
    ]);
    expect(processor.handle(frame, FrameDirection.UPSTREAM)).toEqual([
      { frame, direction: FrameDirection.UPSTREAM },
    ]);
    // Upstream text is never inspected
    expect(context.getMessages()).toHaveLength(1);
  });

  it("ignores text without order intent or numbers", () => {
    say("hello there");
    say("   ");

    expect(context.getMessages()).toEqual([]);
  });
});
