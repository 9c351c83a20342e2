import { StoredDocument } from '../lib/documentStore';
import { CorruptDocumentError } from '../middleware/errorHandler';
import { DocumentReader } from '../utils/documents';
import {
  requireIntegerInRange,
  requireNonEmptyArray,
  requireRecord,
  requireString,
} from '../utils/validators';

export const ORDER_STATUSES = ['pending', 'paid', 'failed', 'refunded'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const MIN_QUANTITY = 1;
export const MAX_QUANTITY = 50;

export interface CartItem {
  product_id: string;
  quantity: number;
}

export interface DownloadLink {
  product_id: string;
  token: string;
  expires_at: string;
}

export interface OrderInput {
  customer_name: string;
  customer_email: string;
  items: Array<{ product_id: string; quantity?: number }>;
}

export interface Order {
  id: string;
  status: OrderStatus;
  amount: number;
  items: CartItem[];
  customer_name: string;
  customer_email: string;
  download_links: DownloadLink[];
  created_at: string;
}

// The document written for a new order, before the store assigns id and timestamps
export type NewOrder = Omit<Order, 'id' | 'created_at'>;

export function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.some(status => status === value);
}

export function normalizeOrderInput(input: Partial<Record<keyof OrderInput, unknown>>): OrderInput & { items: CartItem[] } {
  const items = requireNonEmptyArray(input.items, 'items').map((raw, index): CartItem => {
    const field = `items[${index}]`;
    const item = requireRecord(raw, field);

    return {
      product_id: requireString(item.product_id, `${field}.product_id`),
      quantity: item.quantity === undefined
        ? MIN_QUANTITY
        : requireIntegerInRange(item.quantity, `${field}.quantity`, MIN_QUANTITY, MAX_QUANTITY),
    };
  });

  return {
    customer_name: requireString(input.customer_name, 'customer_name'),
    customer_email: requireString(input.customer_email, 'customer_email'),
    items,
  };
}

export function toOrder(doc: StoredDocument): Order {
  const reader = new DocumentReader('order', doc.id, doc);

  const status = reader.string('status');
  if (!isOrderStatus(status)) {
    throw new CorruptDocumentError('order', doc.id, 'status');
  }

  return {
    id: doc.id,
    status,
    amount: reader.number('amount'),
    items: reader.records('items').map(item => ({
      product_id: item.string('product_id'),
      quantity: item.number('quantity'),
    })),
    customer_name: reader.string('customer_name'),
    customer_email: reader.string('customer_email'),
    download_links: reader.records('download_links').map(link => ({
      product_id: link.string('product_id'),
      token: link.string('token'),
      expires_at: link.timestamp('expires_at'),
    })),
    created_at: reader.timestamp('created_at'),
  };
}
