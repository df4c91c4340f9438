import { readFile } from "fs/promises";
import { format, isValid, parseISO } from "date-fns";
import { z } from "zod";
import type {
  OrderItemRecord,
  OrderLine,
  OrderReader,
  OrderRecord,
  ProductRecord,
} from "../../types";
import {
  ErrorCodes,
  ErrorSeverity,
  VoiceAgentError,
  describeError,
} from "../../utils/error";

const productSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullish(),
  price: z.coerce.number(),
  stock_quantity: z.number().int().default(0),
  sku: z.string(),
});

const orderSchema = z.object({
  id: z.number().int(),
  customer_id: z.number().int(),
  order_date: z
    .string()
    .refine((value) => isValid(parseISO(value)), "Invalid ISO date"),
  total_amount: z.coerce.number(),
  status: z.enum(["pending", "processing", "shipped", "delivered", "cancelled"]),
});

const orderItemSchema = z.object({
  order_id: z.number().int(),
  product_id: z.number().int(),
  quantity: z.number().int(),
  unit_price: z.coerce.number(),
});

export const storeSnapshotSchema = z.object({
  products: z.array(productSchema).default([]),
  orders: z.array(orderSchema).default([]),
  order_items: z.array(orderItemSchema).default([]),
});

export type StoreSnapshot = z.infer<typeof storeSnapshotSchema>;

const money = (amount: number): string => `$${amount.toFixed(2)}`;

/**
 * Read-only view over the static store snapshot. Loaded once, never
 * mutated afterwards.
 */
export class OrderService implements OrderReader {
  private products = new Map<number, ProductRecord>();
  private orders = new Map<number, OrderRecord>();
  private itemsByOrder = new Map<number, OrderItemRecord[]>();

  constructor(snapshot: StoreSnapshot) {
    for (const product of snapshot.products) {
      this.products.set(product.id, {
        id: product.id,
        name: product.name,
        description: product.description ?? undefined,
        price: product.price,
        stockQuantity: product.stock_quantity,
        sku: product.sku,
      });
    }

    for (const order of snapshot.orders) {
      this.orders.set(order.id, {
        id: order.id,
        customerId: order.customer_id,
        orderDate: parseISO(order.order_date),
        totalAmount: order.total_amount,
        status: order.status,
      });
    }

    for (const item of snapshot.order_items) {
      const items = this.itemsByOrder.get(item.order_id) ?? [];
      items.push({
        orderId: item.order_id,
        productId: item.product_id,
        quantity: item.quantity,
        unitPrice: item.unit_price,
      });
      this.itemsByOrder.set(item.order_id, items);
    }
  }

  static async fromFile(path: string): Promise<OrderService> {
    return new OrderService(await readStoreSnapshot(path));
  }

  getOrder(id: number): OrderRecord | undefined {
    return this.orders.get(id);
  }

  getItems(orderId: number): OrderLine[] {
    const lines: OrderLine[] = [];
    for (const item of this.itemsByOrder.get(orderId) ?? []) {
      const product = this.products.get(item.productId);
      if (!product) continue;
      lines.push({ product, quantity: item.quantity, unitPrice: item.unitPrice });
    }
    return lines;
  }

  formatOrderDetails(order: OrderRecord): string {
    const lines = [
      `Order #${order.id} Details:`,
      `- Order Date: ${format(order.orderDate, "yyyy-MM-dd HH:mm")}`,
      `- Status: ${order.status}`,
      `- Total Amount: ${money(order.totalAmount)}`,
      "",
      "Items:",
    ];

    const items = this.getItems(order.id);
    if (items.length === 0) {
      lines.push("  No items recorded for this order.");
    }
    for (const item of items) {
      lines.push(
        `  - ${item.product.name}`,
        `    Quantity: ${item.quantity}`,
        `    Price: ${money(item.unitPrice)} each`,
        `    Subtotal: ${money(item.unitPrice * item.quantity)}`
      );
    }

    return lines.join("\n");
  }
}

export async function readStoreSnapshot(path: string): Promise<StoreSnapshot> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new VoiceAgentError(
      "Static dataset not found",
      ErrorCodes.ORDER_DATA_MISSING,
      ErrorSeverity.CRITICAL,
      { component: "OrderService", path, originalError: describeError(error) }
    );
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new VoiceAgentError(
      "Static dataset is malformed",
      ErrorCodes.ORDER_DATA_INVALID,
      ErrorSeverity.CRITICAL,
      { component: "OrderService", path, originalError: describeError(error) }
    );
  }

  const parsed = storeSnapshotSchema.safeParse(payload);
  if (!parsed.success) {
    throw new VoiceAgentError(
      "Static dataset is malformed",
      ErrorCodes.ORDER_DATA_INVALID,
      ErrorSeverity.CRITICAL,
      {
        component: "OrderService",
        path,
        originalError: parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      }
    );
  }
  return parsed.data;
}
