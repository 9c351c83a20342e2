import { DocumentStore } from '../lib/documentStore';
import { ExpiredError, NotFoundError, UnavailableError } from '../middleware/errorHandler';
import { toOrder } from '../models/order';
import { Product, toProduct } from '../models/product';

export interface ResolvedDownload {
  product: Product;
  file_url: string;
}

export interface DownloadService {
  resolve(token: string): Promise<ResolvedDownload>;
}

/**
 * Resolves a download token to the purchased file's URL. Resolution is a
 * pure read: tokens stay valid until they expire, however often they are used.
 */
export const createDownloadService = (
  store: DocumentStore,
  now: () => Date = () => new Date()
): DownloadService => ({
  async resolve(token) {
    const [orderDoc] = await store.find('order', { 'download_links.token': token }, 1);
    if (!orderDoc) {
      throw new NotFoundError('Invalid token');
    }

    const order = toOrder(orderDoc);
    if (order.status !== 'paid') {
      throw new NotFoundError('Invalid token');
    }

    const link = order.download_links.find(candidate => candidate.token === token);
    if (!link) {
      throw new NotFoundError('Download not found');
    }

    if (now().getTime() > Date.parse(link.expires_at)) {
      throw new ExpiredError('Link expired');
    }

    const productDoc = await store.findById('product', link.product_id);
    if (!productDoc) {
      throw new NotFoundError('Product not found');
    }

    const product = toProduct(productDoc);
    if (!product.file_url) {
      throw new UnavailableError('File not available for this product');
    }

    return { product, file_url: product.file_url };
  },
});
