import { ProductInput } from '../../src/models/product';

/**
 * Test Data Fixtures
 */

export const TEST_NOW = new Date('2026-01-01T00:00:00.000Z');
export const TEST_EXPIRY = '2026-01-08T00:00:00.000Z';

export const ebook: ProductInput = {
  title: 'Ebook',
  price: 9.99,
  file_url: 'https://x/e.pdf',
};

export const templatePack: ProductInput = {
  title: 'Template Pack',
  description: 'Editable slide templates',
  price: 1.1,
  thumbnail_url: 'https://x/templates.png',
  file_url: 'https://x/templates.zip',
};

export const audioCourse: ProductInput = {
  title: 'Audio Course',
  price: 2.2,
  file_url: 'https://x/course.zip',
};

// Listed for sale without a deliverable attached yet
export const comingSoon: ProductInput = {
  title: 'Coming Soon',
  price: 5,
};

export const customer = {
  customer_name: 'Test Customer',
  customer_email: 'customer@example.com',
};

export const UNKNOWN_ID = '0000000000000000000000ff';
