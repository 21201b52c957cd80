/**
 * Order API routes.
 *
 * POST /orders/:orderId/provision — Start provisioning for a paid order
 */

import { Router } from 'express';
import { OrchestratorError, validationError } from '../domain/errors';
import { Order } from '../domain/resource';
import { ProvisioningOrchestrator } from '../engine/orchestrator';
import { bodyOf, isRecord, sendError } from './middleware';

/** Build an Order from a request body, or throw VALIDATION.SCHEMA. */
export function parseOrder(orderId: string, body: Record<string, unknown>): Order {
  const { userId, planId, requiresProvisioning, lineItemId, options } = body;
  const problems: string[] = [];
  if (typeof userId !== 'string' || userId === '') problems.push('userId must be a non-empty string');
  if (typeof planId !== 'string' || planId === '') problems.push('planId must be a non-empty string');
  if (requiresProvisioning !== undefined && typeof requiresProvisioning !== 'boolean') {
    problems.push('requiresProvisioning must be a boolean');
  }
  if (lineItemId !== undefined && typeof lineItemId !== 'string') problems.push('lineItemId must be a string');
  if (options !== undefined && !isRecord(options)) problems.push('options must be an object');

  if (problems.length > 0 || typeof userId !== 'string' || typeof planId !== 'string') {
    throw new OrchestratorError(validationError(`Invalid order: ${problems.join('; ')}`, { problems }));
  }

  const order: Order = {
    id: orderId,
    userId,
    planId,
    requiresProvisioning: requiresProvisioning !== false,
    lineItemId: typeof lineItemId === 'string' ? lineItemId : undefined,
  };
  if (isRecord(options)) {
    const { hostname, image, ...rest } = options;
    order.options = {
      ...rest,
      hostname: typeof hostname === 'string' ? hostname : undefined,
      image: typeof image === 'string' ? image : undefined,
    };
  }
  return order;
}

export function createOrderRoutes(orchestrator: ProvisioningOrchestrator): Router {
  const router = Router();

  /**
   * POST /orders/:orderId/provision
   * Idempotent: a second call for the same order returns the same resource.
   */
  router.post('/orders/:orderId/provision', async (req, res) => {
    try {
      const order = parseOrder(req.params.orderId, bodyOf(req));
      if (!order.requiresProvisioning) {
        res.status(200).json({ resource: null, skipped: true });
        return;
      }
      const resource = await orchestrator.kick(order);
      res.status(202).json({ resource });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
