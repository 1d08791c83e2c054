import express, { type Router } from 'express';
import { RelayError, type ReservationManager } from 'keyrelay-core';
import { asyncHandler } from './error-handler.js';
import { isNonEmptyString, jsonBody, optionalNumber, optionalString, requireString } from './request-body.js';

/**
 * Key package pool and reservation endpoints.
 *
 * POST /users/:userId/key-packages            upload a batch
 * GET  /users/:userId/key-packages/status     pool counts
 * POST /users/:userId/key-packages/reserve    claim one
 * POST /reservations/:reservationId/consume
 * POST /reservations/:reservationId/release
 */
export function keyPackageRoutes(reservations: ReservationManager, maxPayloadBytes: number): Router {
  const router = express.Router();

  router.post(
    '/users/:userId/key-packages',
    asyncHandler(async (req, res) => {
      const body = jsonBody(req);
      const keyPackages = body.keyPackages;
      if (!Array.isArray(keyPackages) || keyPackages.length === 0 || !keyPackages.every(isNonEmptyString)) {
        throw new RelayError('INVALID_PAYLOAD', 'keyPackages must be a non-empty array of strings');
      }
      for (const keyPackage of keyPackages) {
        if (Buffer.byteLength(keyPackage) > maxPayloadBytes) {
          throw new RelayError('INVALID_PAYLOAD', `key package exceeds ${maxPayloadBytes} bytes`);
        }
      }

      const ids = await reservations.uploadMany(req.params.userId, keyPackages, {
        notAfter: optionalNumber(body, 'notAfter'),
      });
      res.status(201).json({ ids });
    }),
  );

  router.get(
    '/users/:userId/key-packages/status',
    asyncHandler(async (req, res) => {
      res.json(await reservations.status(req.params.userId));
    }),
  );

  router.post(
    '/users/:userId/key-packages/reserve',
    asyncHandler(async (req, res) => {
      const body = jsonBody(req);
      const reserved = await reservations.reserve(req.params.userId, {
        claimantId: requireString(body, 'claimantId'),
        groupId: optionalString(body, 'groupId'),
      });
      res.json({
        reservationId: reserved.reservationId,
        keyPackageId: reserved.keyPackageId,
        keyPackage: reserved.blob,
        expiresAt: reserved.expiresAt,
      });
    }),
  );

  router.post(
    '/reservations/:reservationId/consume',
    asyncHandler(async (req, res) => {
      await reservations.consume(req.params.reservationId);
      res.status(204).end();
    }),
  );

  router.post(
    '/reservations/:reservationId/release',
    asyncHandler(async (req, res) => {
      await reservations.release(req.params.reservationId);
      res.status(204).end();
    }),
  );

  return router;
}
