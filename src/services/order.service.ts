import { DocumentStore } from '../lib/documentStore';
import { NotFoundError } from '../middleware/errorHandler';
import { CartItem, DownloadLink, NewOrder, Order, OrderInput, normalizeOrderInput, toOrder } from '../models/order';
import { toProduct } from '../models/product';
import { roundCurrency } from '../utils/money';
import { generateDownloadToken } from '../utils/tokens';
import { logger } from '../utils/logger';
import { PaymentProcessor, simulatedPaymentProcessor } from './payment.service';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OrderServiceOptions {
  downloadTtlDays?: number;
  payments?: PaymentProcessor;
  now?: () => Date;
  generateToken?: () => string;
}

export interface OrderService {
  placeOrder(input: OrderInput): Promise<Order>;
  getOrder(id: string): Promise<Order>;
}

export const createOrderService = (store: DocumentStore, options: OrderServiceOptions = {}): OrderService => {
  const {
    downloadTtlDays = 7,
    payments = simulatedPaymentProcessor,
    now = () => new Date(),
    generateToken = generateDownloadToken,
  } = options;

  const getOrder = async (id: string): Promise<Order> => {
    const doc = await store.findById('order', id);
    if (!doc) {
      throw new NotFoundError('Order not found');
    }
    return toOrder(doc);
  };

  // Every product is looked up before anything is written
  const priceCart = async (items: CartItem[]): Promise<number> => {
    let total = 0;

    for (const item of items) {
      const doc = await store.findById('product', item.product_id);
      if (!doc) {
        throw new NotFoundError(`Product not found: ${item.product_id}`);
      }
      total += toProduct(doc).price * item.quantity;
    }

    return roundCurrency(total);
  };

  const mintDownloadLinks = (items: CartItem[]): DownloadLink[] => {
    const expiresAt = new Date(now().getTime() + downloadTtlDays * DAY_MS).toISOString();

    return items.map(item => ({
      product_id: item.product_id,
      token: generateToken(),
      expires_at: expiresAt,
    }));
  };

  return {
    async placeOrder(input) {
      const { customer_name, customer_email, items } = normalizeOrderInput(input);

      const amount = await priceCart(items);
      const status = await payments.settle(amount, customer_email);

      const order: NewOrder = {
        status,
        amount,
        items,
        customer_name,
        customer_email,
        // Files are only released for settled payments
        download_links: status === 'paid' ? mintDownloadLinks(items) : [],
      };

      const id = await store.create('order', order);
      logger.info('Order placed', { orderId: id, amount, status, itemCount: items.length });

      return getOrder(id);
    },

    getOrder,
  };
};
