export * from "./frames";

// Message types
export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export type ConversationState = "listening" | "processing" | "responding";

// Transcript types
export type Speaker = "user" | "bot";

export interface TranscriptEntry {
  speaker: Speaker;
  text: string;
  timestamp: Date;
}

export interface TranscriptSubscriber {
  id: string;
  send(payload: string): Promise<void>;
}

// Order store records
export type OrderStatus =
  | "pending"
  | "processing"
  | "shipped"
  | "delivered"
  | "cancelled";

export interface OrderRecord {
  id: number;
  customerId: number;
  orderDate: Date;
  totalAmount: number;
  status: OrderStatus;
}

export interface OrderItemRecord {
  orderId: number;
  productId: number;
  quantity: number;
  unitPrice: number;
}

export interface ProductRecord {
  id: number;
  name: string;
  description?: string;
  price: number;
  stockQuantity: number;
  sku: string;
}

export interface OrderLine {
  product: ProductRecord;
  quantity: number;
  unitPrice: number;
}

export interface OrderReader {
  getOrder(id: number): OrderRecord | undefined;
  getItems(orderId: number): OrderLine[];
  formatOrderDetails(order: OrderRecord): string;
}

// Health types
export type DatasetStatus = "static-json" | "missing" | "invalid";

export interface HealthResponse {
  status: "healthy" | "unhealthy";
  database: DatasetStatus;
  message: string;
}
