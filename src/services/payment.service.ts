import { OrderStatus } from '../models/order';

/**
 * Where a real gateway would plug in. Resolves to the status the new order
 * is created with.
 */
export interface PaymentProcessor {
  settle(amount: number, customerEmail: string): Promise<OrderStatus>;
}

// Every payment succeeds instantly
export const simulatedPaymentProcessor: PaymentProcessor = {
  async settle(): Promise<OrderStatus> {
    return 'paid';
  },
};
