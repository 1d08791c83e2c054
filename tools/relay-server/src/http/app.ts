import express, { type Express } from 'express';
import type { BackupStore, ReservationManager } from 'keyrelay-core';
import { backupRoutes } from './backup.routes.js';
import { errorHandler, notFoundHandler } from './error-handler.js';
import { keyPackageRoutes } from './key-package.routes.js';

export interface AppDependencies {
  reservations: ReservationManager;
  backups: BackupStore;
  maxPayloadBytes: number;
  maxRequestBytes: number;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: deps.maxRequestBytes }));

  app.use(keyPackageRoutes(deps.reservations, deps.maxPayloadBytes));
  app.use(backupRoutes(deps.backups));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
