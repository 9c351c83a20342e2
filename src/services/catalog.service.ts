import { DocumentStore } from '../lib/documentStore';
import { NotFoundError } from '../middleware/errorHandler';
import { Product, ProductInput, normalizeProductInput, toProduct } from '../models/product';

export interface CatalogService {
  createProduct(input: ProductInput): Promise<Product>;
  listProducts(): Promise<Product[]>;
  getProduct(id: string): Promise<Product>;
}

export const createCatalogService = (store: DocumentStore): CatalogService => {
  const getProduct = async (id: string): Promise<Product> => {
    const doc = await store.findById('product', id);
    if (!doc) {
      throw new NotFoundError(`Product not found: ${id}`);
    }
    return toProduct(doc);
  };

  return {
    // Re-reads after insert so the caller sees the stored id and timestamp
    async createProduct(input) {
      const data = normalizeProductInput(input);
      const id = await store.create('product', data);
      return getProduct(id);
    },

    async listProducts() {
      const docs = await store.find('product');
      return docs.map(toProduct);
    },

    getProduct,
  };
};
