import { Request, Response, NextFunction } from 'express';
import { CatalogService } from '../services/catalog.service';

export const createProductController = (catalog: CatalogService) => ({
  // Get all products
  getAllProducts: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const products = await catalog.listProducts();

      res.json({
        success: true,
        data: { products },
      });
    } catch (error) {
      next(error);
    }
  },

  // Create product
  createProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { title, description, price, thumbnail_url, file_url } = req.body;

      const product = await catalog.createProduct({ title, description, price, thumbnail_url, file_url });

      res.status(201).json({
        success: true,
        message: 'Product created successfully',
        data: { product },
      });
    } catch (error) {
      next(error);
    }
  },
});
