import { Router } from 'express';
import { body } from 'express-validator';
import { createOrderController } from '../controllers/order.controller';
import { validate } from '../middleware/validate';
import { MAX_QUANTITY, MIN_QUANTITY } from '../models/order';
import { OrderService } from '../services/order.service';

export const createOrderRoutes = (orders: OrderService): Router => {
  const router = Router();
  const orderController = createOrderController(orders);

  // Get order by ID
  router.get('/:id', orderController.getOrderById);

  // Create order
  router.post(
    '/',
    [
      body('customer_name').isString().trim().notEmpty(),
      body('customer_email').isString().trim().notEmpty(),
      body('items').isArray({ min: 1 }),
      body('items.*.product_id').isString().notEmpty(),
      body('items.*.quantity').optional().isInt({ min: MIN_QUANTITY, max: MAX_QUANTITY }).toInt(),
    ],
    validate,
    orderController.createOrder
  );

  return router;
};
