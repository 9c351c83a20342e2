import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import { AppConfig } from './config/env';
import { DocumentStore } from './lib/documentStore';
import { errorHandler } from './middleware/errorHandler';
import { notFoundHandler } from './middleware/notFoundHandler';
import { createHealthController } from './controllers/health.controller';
import { createCatalogService } from './services/catalog.service';
import { createOrderService } from './services/order.service';
import { createDownloadService } from './services/download.service';
import { createLeadService } from './services/lead.service';
import { PaymentProcessor } from './services/payment.service';
import { createProductRoutes } from './routes/product.routes';
import { createOrderRoutes } from './routes/order.routes';
import { createDownloadRoutes } from './routes/download.routes';
import { createLeadRoutes } from './routes/lead.routes';
import { logger } from './utils/logger';

export interface AppDependencies {
  config: AppConfig;
  store: DocumentStore;
  checkDatabase: () => Promise<boolean>;
  payments?: PaymentProcessor;
  now?: () => Date;
}

export const createApp = ({ config, store, checkDatabase, payments, now }: AppDependencies): Application => {
  const app: Application = express();

  // ============================================
  // MIDDLEWARE
  // ============================================

  // Security
  app.use(helmet());

  const { allowedOrigins } = config;

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like mobile apps or curl requests)
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
        callback(null, true);
      } else {
        logger.warn('CORS blocked origin', { origin });
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
  }));

  // Body parsing
  app.use(express.json({ limit: '10mb' }));

  // Compression
  app.use(compression());

  // Request logging
  if (config.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (config.nodeEnv !== 'test') {
    app.use(morgan('combined'));
  }

  // ============================================
  // ROUTES
  // ============================================

  const healthController = createHealthController({ store, config, checkDatabase });

  app.get('/', healthController.root);
  app.get('/health', healthController.health);
  app.get('/api/health', healthController.deepHealth);
  app.get('/test', healthController.storeDiagnostics);

  const catalog = createCatalogService(store);
  const orders = createOrderService(store, {
    downloadTtlDays: config.downloadTtlDays,
    payments,
    now,
  });
  const downloads = createDownloadService(store, now);
  const leads = createLeadService(store);

  app.use('/api/products', createProductRoutes(catalog));
  app.use('/api/orders', createOrderRoutes(orders));
  app.use('/api/download', createDownloadRoutes(downloads));
  app.use('/api/demo-lead', createLeadRoutes(leads));

  // ============================================
  // ERROR HANDLING
  // ============================================

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(errorHandler);

  return app;
};
