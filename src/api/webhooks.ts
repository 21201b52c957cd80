/**
 * Webhook API routes.
 *
 * POST /webhooks/:driverId — Provider callback
 *
 * The body is read as raw text so the driver can verify the signature over
 * exactly the bytes the provider signed. Mount before any JSON parser.
 * A verified delivery is acknowledged with 202 and applied as a job.
 */

import express, { Router } from 'express';
import { IncomingHttpHeaders } from 'http';
import { WebhookDelivery } from '../drivers/driver';
import { ProvisioningOrchestrator } from '../engine/orchestrator';
import { sendError } from './middleware';

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

export function createWebhookRoutes(orchestrator: ProvisioningOrchestrator, now: () => number = Date.now): Router {
  const router = Router();

  router.post('/webhooks/:driverId', express.text({ type: '*/*', limit: '1mb' }), async (req, res) => {
    try {
      const body: unknown = req.body;
      const delivery: WebhookDelivery = {
        headers: flattenHeaders(req.headers),
        rawBody: typeof body === 'string' ? body : '',
        receivedAt: now(),
      };
      const jobId = await orchestrator.receiveWebhook(req.params.driverId, delivery);
      res.status(202).json({ accepted: true, jobId });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
