/**
 * Resource API routes.
 *
 * GET    /resources/:resourceId                — Resource and its tasks
 * GET    /resources/:resourceId/audit          — Lifecycle history
 * GET    /resources/:resourceId/metrics/:kind  — usage, health or costs
 * POST   /resources/:resourceId/suspend        — Suspend
 * POST   /resources/:resourceId/resume         — Resume
 * POST   /resources/:resourceId/resize         — Change plan or spec
 * POST   /resources/:resourceId/sync           — Check for drift
 * DELETE /resources/:resourceId                — Deprovision
 *
 * Lifecycle calls answer 202 with the task that carries the work.
 */

import { Router } from 'express';
import { OrchestratorError, validationError } from '../domain/errors';
import { MetricsKind } from '../drivers/driver';
import { ProvisioningOrchestrator, ResourceSpecChanges } from '../engine/orchestrator';
import { actorOf, bodyOf, isRecord, sendError } from './middleware';

const METRICS_KINDS: readonly MetricsKind[] = ['usage', 'health', 'costs'];

function isMetricsKind(value: string): value is MetricsKind {
  return METRICS_KINDS.some((kind) => kind === value);
}

/** Read the resize changes from a request body, or throw VALIDATION.SCHEMA. */
export function parseSpecChanges(body: Record<string, unknown>): ResourceSpecChanges {
  const changes: ResourceSpecChanges = {};
  for (const field of ['planCode', 'region', 'hostname', 'image'] as const) {
    const value = body[field];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value === '') {
      throw new OrchestratorError(validationError(`${field} must be a non-empty string`));
    }
    changes[field] = value;
  }
  if (body.extra !== undefined) {
    if (!isRecord(body.extra)) {
      throw new OrchestratorError(validationError('extra must be an object'));
    }
    changes.extra = body.extra;
  }
  return changes;
}

export function createResourceRoutes(orchestrator: ProvisioningOrchestrator): Router {
  const router = Router();

  router.get('/resources/:resourceId', async (req, res) => {
    try {
      res.json(await orchestrator.getResource(req.params.resourceId));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/resources/:resourceId/audit', async (req, res) => {
    try {
      const audit = await orchestrator.getHistory(req.params.resourceId);
      res.json({ audit });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/resources/:resourceId/metrics/:kind', async (req, res) => {
    try {
      const { kind } = req.params;
      if (!isMetricsKind(kind)) {
        throw new OrchestratorError(validationError(`Unknown metrics kind: ${kind}`, { allowed: METRICS_KINDS }));
      }
      res.json({ [kind]: await orchestrator.metrics(req.params.resourceId, kind) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/resources/:resourceId/suspend', async (req, res) => {
    try {
      const task = await orchestrator.suspend(req.params.resourceId, actorOf(req));
      res.status(202).json({ task });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/resources/:resourceId/resume', async (req, res) => {
    try {
      const task = await orchestrator.resume(req.params.resourceId, actorOf(req));
      res.status(202).json({ task });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/resources/:resourceId/resize', async (req, res) => {
    try {
      const changes = parseSpecChanges(bodyOf(req));
      const task = await orchestrator.resize(req.params.resourceId, changes, actorOf(req));
      res.status(202).json({ task });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/resources/:resourceId/sync', async (req, res) => {
    try {
      const task = await orchestrator.sync(req.params.resourceId, actorOf(req));
      res.status(202).json({ task });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete('/resources/:resourceId', async (req, res) => {
    try {
      const task = await orchestrator.deprovision(req.params.resourceId, actorOf(req));
      res.status(202).json({ task });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
