import express, { type Router } from 'express';
import type { BackupStore } from 'keyrelay-core';
import { asyncHandler } from './error-handler.js';
import { jsonBody, requireNumber, requireString } from './request-body.js';

export function backupRoutes(backups: BackupStore): Router {
  const router = express.Router();

  router.put(
    '/backups/:userId',
    asyncHandler(async (req, res) => {
      const body = jsonBody(req);
      const stored = await backups.storeBackup(
        req.params.userId,
        requireNumber(body, 'version'),
        requireString(body, 'blob'),
      );
      res.json({ version: stored.version });
    }),
  );

  router.get(
    '/backups/:userId',
    asyncHandler(async (req, res) => {
      const backup = await backups.getBackup(req.params.userId);
      res.json({ version: backup.version, blob: backup.blob, storedAt: backup.storedAt });
    }),
  );

  return router;
}
