/**
 * Driver API routes.
 *
 * GET /drivers                          — Registered drivers
 * GET /drivers/:driverId                — Name, type and capabilities
 * GET /drivers/:driverId/inventory/:kind — regions, images, plans or quotas
 */

import { Router } from 'express';
import { OrchestratorError, validationError } from '../domain/errors';
import { InventoryKind } from '../drivers/driver';
import { DriverRegistry } from '../drivers/registry';
import { ProvisioningOrchestrator } from '../engine/orchestrator';
import { sendError } from './middleware';

const INVENTORY_KINDS: readonly InventoryKind[] = ['regions', 'images', 'plans', 'quotas'];

function isInventoryKind(value: string): value is InventoryKind {
  return INVENTORY_KINDS.some((kind) => kind === value);
}

export function createDriverRoutes(registry: DriverRegistry, orchestrator: ProvisioningOrchestrator): Router {
  const router = Router();

  router.get('/drivers', (_req, res) => {
    res.json({ drivers: registry.list() });
  });

  router.get('/drivers/:driverId', (req, res) => {
    try {
      res.json({ driver: registry.describe(req.params.driverId) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/drivers/:driverId/inventory/:kind', async (req, res) => {
    try {
      const { driverId, kind } = req.params;
      if (!isInventoryKind(kind)) {
        throw new OrchestratorError(validationError(`Unknown inventory kind: ${kind}`, { allowed: INVENTORY_KINDS }));
      }
      res.json({ [kind]: await orchestrator.inventory(driverId, kind) });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
