import { Request, Response } from 'express';
import { DocumentStore } from '../lib/documentStore';
import { AppConfig } from '../config/env';

export interface HealthDependencies {
  store: DocumentStore;
  config: AppConfig;
  checkDatabase: () => Promise<boolean>;
}

export interface StoreDiagnostics {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: string;
  collections: string[];
}

const MAX_LISTED_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

export const createHealthController = ({ store, config, checkDatabase }: HealthDependencies) => ({
  root: (req: Request, res: Response) => {
    res.json({ message: 'Digital Products Store Backend running' });
  },

  // Basic health check (for load balancers)
  health: (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
    });
  },

  // Deep health check (includes database)
  deepHealth: async (req: Request, res: Response) => {
    let dbConnected = false;
    try {
      dbConnected = await checkDatabase();
    } catch {
      dbConnected = false;
    }

    res.status(dbConnected ? 200 : 503).json({
      success: dbConnected,
      status: dbConnected ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
      database: dbConnected ? 'connected' : 'disconnected',
    });
  },

  // Store introspection; failures are reported in the body, never as a failed request
  storeDiagnostics: async (req: Request, res: Response) => {
    const report: StoreDiagnostics = {
      backend: 'Running',
      database: 'Not Available',
      database_url: config.databaseUrl ? 'Set' : 'Not Set',
      database_name: config.databaseName ? 'Set' : 'Not Set',
      connection_status: 'Not Connected',
      collections: [],
    };

    try {
      const info = await store.describe();
      report.database = 'Connected & Working';
      report.connection_status = 'Connected';
      report.collections = info.collections.slice(0, MAX_LISTED_COLLECTIONS);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      report.database = `Error: ${message.slice(0, MAX_ERROR_LENGTH)}`;
    }

    res.json(report);
  },
});
