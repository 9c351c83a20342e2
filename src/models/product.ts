import { StoredDocument } from '../lib/documentStore';
import { DocumentReader } from '../utils/documents';
import { optionalString, requireNonNegativeNumber, requireString } from '../utils/validators';

export interface ProductInput {
  title: string;
  description?: string;
  price: number;
  thumbnail_url?: string;
  // Public URL of the deliverable; without it the product cannot be downloaded
  file_url?: string;
}

export interface Product extends ProductInput {
  id: string;
  created_at: string;
}

export function normalizeProductInput(input: Partial<Record<keyof ProductInput, unknown>>): ProductInput {
  const product: ProductInput = {
    title: requireString(input.title, 'title'),
    price: requireNonNegativeNumber(input.price, 'price'),
  };

  const description = optionalString(input.description, 'description');
  const thumbnailUrl = optionalString(input.thumbnail_url, 'thumbnail_url');
  const fileUrl = optionalString(input.file_url, 'file_url');

  if (description !== undefined) product.description = description;
  if (thumbnailUrl !== undefined) product.thumbnail_url = thumbnailUrl;
  if (fileUrl !== undefined) product.file_url = fileUrl;

  return product;
}

export function toProduct(doc: StoredDocument): Product {
  const reader = new DocumentReader('product', doc.id, doc);

  return {
    id: doc.id,
    title: reader.string('title'),
    description: reader.optionalString('description'),
    price: reader.number('price'),
    thumbnail_url: reader.optionalString('thumbnail_url'),
    file_url: reader.optionalString('file_url'),
    created_at: reader.timestamp('created_at'),
  };
}
