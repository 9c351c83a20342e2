import { Router } from 'express';
import { body } from 'express-validator';
import { createProductController } from '../controllers/product.controller';
import { validate } from '../middleware/validate';
import { CatalogService } from '../services/catalog.service';

export const createProductRoutes = (catalog: CatalogService): Router => {
  const router = Router();
  const productController = createProductController(catalog);

  router.get('/', productController.getAllProducts);

  router.post(
    '/',
    [
      body('title').isString().trim().notEmpty(),
      body('description').optional({ values: 'null' }).isString(),
      body('price').isFloat({ min: 0 }).toFloat(),
      body('thumbnail_url').optional({ values: 'null' }).isString(),
      body('file_url').optional({ values: 'null' }).isString(),
    ],
    validate,
    productController.createProduct
  );

  return router;
};
