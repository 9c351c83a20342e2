import { Request, Response, NextFunction } from 'express';
import { OrderService } from '../services/order.service';

export const createOrderController = (orders: OrderService) => ({
  // Create order; payment is settled and download links issued in the same request
  createOrder: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { customer_name, customer_email, items } = req.body;

      const order = await orders.placeOrder({ customer_name, customer_email, items });

      res.status(201).json({
        success: true,
        message: 'Order created successfully',
        data: { order },
      });
    } catch (error) {
      next(error);
    }
  },

  // Get order by ID
  getOrderById: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const order = await orders.getOrder(req.params.id);

      res.json({
        success: true,
        data: { order },
      });
    } catch (error) {
      next(error);
    }
  },
});
