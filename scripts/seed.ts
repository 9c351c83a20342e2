import { DEFAULT_DATABASE_NAME, DEFAULT_DATABASE_URL, loadConfig } from '../src/config/env';
import { connectDatabase, disconnectDatabase } from '../src/lib/mongo';
import { MongoDocumentStore } from '../src/lib/mongoDocumentStore';
import { ProductInput } from '../src/models/product';
import { createCatalogService } from '../src/services/catalog.service';
import { logger } from '../src/utils/logger';

const demoProducts: ProductInput[] = [
  {
    title: 'Starter Budget Planner',
    description: 'Printable monthly budget planner with savings trackers',
    price: 4.99,
    thumbnail_url: 'https://example.com/thumbnails/budget-planner.png',
    file_url: 'https://example.com/files/budget-planner.pdf',
  },
  {
    title: 'Social Media Content Calendar',
    description: 'Twelve-month posting calendar with caption prompts',
    price: 9.99,
    thumbnail_url: 'https://example.com/thumbnails/content-calendar.png',
    file_url: 'https://example.com/files/content-calendar.zip',
  },
  {
    title: 'Freelancer Invoice Pack',
    description: 'Editable invoice and quote templates',
    price: 0,
    file_url: 'https://example.com/files/invoice-pack.zip',
  },
];

async function main() {
  const config = loadConfig();
  const connection = await connectDatabase(
    config.databaseUrl ?? DEFAULT_DATABASE_URL,
    config.databaseName ?? DEFAULT_DATABASE_NAME
  );

  try {
    const catalog = createCatalogService(new MongoDocumentStore(connection));

    for (const input of demoProducts) {
      const product = await catalog.createProduct(input);
      logger.info('Product seeded', { productId: product.id, title: product.title });
    }
  } finally {
    await disconnectDatabase(connection);
  }
}

main().catch(error => {
  logger.error('Seeding failed', error);
  process.exit(1);
});
