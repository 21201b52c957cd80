/**
 * Orchestrator end-to-end flows over the in-memory store and a
 * virtual-clock queue.
 */

import { SYSTEM_ACTOR } from '../../src/domain/audit';
import { OrchestratorError, ProviderError } from '../../src/domain/errors';
import { ResourceStatus } from '../../src/domain/resource';
import { TaskStatus } from '../../src/domain/task';
import { CircuitState } from '../../src/engine/circuit-breaker';
import { isValidHistory } from '../../src/engine/state-machine';
import { signWebhookBody } from '../../src/drivers/webhook-signature';
import { WebhookDelivery } from '../../src/drivers/driver';
import { FakeDriver } from '../helpers/fake-driver';
import { DRIVER_ID, Harness, START_TIME, TEST_SECRET, captureLogs, createHarness, makeOrder } from '../helpers/setup';

captureLogs();

async function expectTypedError(promise: Promise<unknown>, code: string): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(OrchestratorError);
  await promise.catch((err: unknown) => {
    expect(err instanceof OrchestratorError ? err.typedError.code : undefined).toBe(code);
  });
}

async function provisionActive(h: Harness, orderId = 'ord_1'): Promise<string> {
  h.driver.pollResults.push({ status: 'completed', providerResourceId: 'srv-42' });
  const resource = await h.orchestrator.kick(makeOrder(orderId));
  await h.queue.drain();
  const current = await h.store.resources.getById(resource.id);
  expect(current?.status).toBe(ResourceStatus.Active);
  return resource.id;
}

function signedDelivery(body: Record<string, unknown>, at: number, secret = TEST_SECRET): WebhookDelivery {
  const rawBody = JSON.stringify(body);
  return {
    headers: { 'x-signature': signWebhookBody(secret, at, rawBody), 'x-timestamp': String(at) },
    rawBody,
    receivedAt: at,
  };
}

describe('ProvisioningOrchestrator', () => {
  describe('kick', () => {
    it('creates a queued resource with a spec built from the plan map and order', async () => {
      const h = await createHarness();
      const resource = await h.orchestrator.kick(
        makeOrder('ord_1', { lineItemId: 'li_9', options: { hostname: 'web-1', backups: true } }),
      );

      expect(resource.status).toBe(ResourceStatus.Queued);
      expect(resource.driverId).toBe(DRIVER_ID);
      expect(resource.providerRef).toBeNull();
      expect(resource.lineItemId).toBe('li_9');
      expect(resource.spec).toEqual({
        planCode: 'cx11',
        region: 'eu-central',
        hostname: 'web-1',
        image: undefined,
        extra: { ipv6: true, backups: true },
      });

      const tasks = await h.store.tasks.listByResource(resource.id);
      expect(tasks).toHaveLength(1);
      expect(tasks[0].action).toBe('provision');
      expect(tasks[0].status).toBe(TaskStatus.Pending);

      const events = await h.orchestrator.publisher.getEventsByResource(resource.id);
      expect(events.map((e) => e.type)).toEqual(['OrderPlaced']);
    });

    it('returns the existing resource for a repeated order without new work', async () => {
      const h = await createHarness();
      const first = await h.orchestrator.kick(makeOrder());
      const second = await h.orchestrator.kick(makeOrder());

      expect(second.id).toBe(first.id);
      expect(await h.store.tasks.listByResource(first.id)).toHaveLength(1);
      expect(h.queue.size()).toBe(1);

      await h.queue.drain(1);
      expect(h.driver.provisionCalls).toHaveLength(1);
    });

    it('rejects an order whose plan has no plan map', async () => {
      const h = await createHarness();
      await expectTypedError(h.orchestrator.kick(makeOrder('ord_x', { planId: 'plan_missing' })), 'VALIDATION.NOT_FOUND');
      expect(await h.store.resources.getByOrderId('ord_x')).toBeNull();
    });

    it('rejects an order without a user', async () => {
      const h = await createHarness();
      await expectTypedError(h.orchestrator.kick(makeOrder('ord_1', { userId: '' })), 'VALIDATION.SCHEMA');
    });
  });

  describe('provisioning flows', () => {
    it('reaches ACTIVE after three pending polls and a completed one', async () => {
      const h = await createHarness();
      h.driver.pollResults.push(
        { status: 'pending' },
        { status: 'pending' },
        { status: 'pending' },
        { status: 'completed', providerResourceId: 'srv-42' },
      );

      const resource = await h.orchestrator.kick(makeOrder());
      const ran = await h.queue.drain();

      const current = await h.store.resources.getById(resource.id);
      const [task] = await h.store.tasks.listByResource(resource.id);
      expect(ran).toBe(5);
      expect(current?.status).toBe(ResourceStatus.Active);
      expect(current?.providerRef).toBe('srv-42');
      expect(task.status).toBe(TaskStatus.Completed);
      expect(task.pollAttempts).toBe(4);
      expect(h.driver.pollCalls).toEqual(['ptask_1', 'ptask_1', 'ptask_1', 'ptask_1']);
      // 2s + 4s + 8s + 16s of backoff with zero jitter
      expect(h.clock.now()).toBe(START_TIME + 30_000);

      const history = await h.orchestrator.getHistory(resource.id);
      expect(history.map((row) => row.action)).toEqual(['queue', 'provision.accepted', 'driver.succeeded']);
      expect(history.map((row) => row.sequence)).toEqual([1, 2, 3]);
      expect(isValidHistory(history)).toBe(true);

      const events = await h.orchestrator.publisher.getEventsByResource(resource.id);
      expect(events.map((e) => e.type)).toEqual(['OrderPlaced', 'ResourceProvisioned']);
    });

    it('retries transient provision errors with a fresh idempotency key each attempt', async () => {
      const h = await createHarness();
      h.driver.provisionErrors.push(
        new ProviderError('provider busy', { statusCode: 503 }),
        new ProviderError('provider busy', { statusCode: 503 }),
      );
      h.driver.pollResults.push({ status: 'completed' });

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      const [task] = await h.store.tasks.listByResource(resource.id);
      expect(task.attempts).toBe(3);
      expect(h.driver.provisionCalls.map((c) => c.key)).toEqual([
        'ord_1:attempt_1',
        'ord_1:attempt_2',
        'ord_1:attempt_3',
      ]);
      expect(h.driver.createdResources).toBe(1);
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Active);
    });

    it('fails the resource when the first poll reports failure and stops polling', async () => {
      const h = await createHarness();
      h.driver.pollResults.push({ status: 'failed', message: 'quota exceeded' });

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      const current = await h.store.resources.getById(resource.id);
      const [task] = await h.store.tasks.listByResource(resource.id);
      expect(current?.status).toBe(ResourceStatus.Failed);
      expect(current?.lastError).toBe('quota exceeded');
      expect(task.status).toBe(TaskStatus.Failed);
      expect(task.lastError?.code).toBe('PROVIDER.PERMANENT');
      expect(h.driver.pollCalls).toHaveLength(1);
      expect(h.queue.size()).toBe(0);

      const events = await h.orchestrator.publisher.getEventsByResource(resource.id);
      expect(events.map((e) => e.type)).toEqual(['OrderPlaced', 'ResourceFailed']);
    });

    it('times out after the poll budget is spent', async () => {
      const h = await createHarness({ config: { poller: { maxPollAttempts: 3 } } });

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      const [task] = await h.store.tasks.listByResource(resource.id);
      expect(h.driver.pollCalls).toHaveLength(3);
      expect(task.lastError?.code).toBe('PROVIDER.TIMEOUT');
      expect(task.lastError?.message).toBe('Provider task did not finish after 3 status checks');

      const history = await h.orchestrator.getHistory(resource.id);
      expect(history[history.length - 1].action).toBe('driver.timeout');
      expect(history[history.length - 1].statusAfter).toBe(ResourceStatus.Failed);
    });

    it('keeps polling through a transient poll error', async () => {
      const h = await createHarness();
      h.driver.pollResults.push(new Error('socket hang up'), { status: 'completed' });

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      const [task] = await h.store.tasks.listByResource(resource.id);
      expect(task.pollAttempts).toBe(2);
      expect(task.status).toBe(TaskStatus.Completed);
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Active);
    });

    it('fails from QUEUED when dispatch attempts run out', async () => {
      const h = await createHarness({ config: { poller: { maxDispatchAttempts: 2 } } });
      h.driver.provisionErrors.push(
        new ProviderError('provider busy', { statusCode: 503 }),
        new ProviderError('provider busy', { statusCode: 503 }),
      );

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      const current = await h.store.resources.getById(resource.id);
      const [task] = await h.store.tasks.listByResource(resource.id);
      expect(current?.status).toBe(ResourceStatus.Failed);
      expect(current?.lastError).toBe('provider busy');
      expect(task.attempts).toBe(2);
      expect(task.lastError?.retryable).toBe(false);
      expect(task.lastError?.details).toEqual({ statusCode: 503, attempts: 2, maxAttempts: 2 });
    });

    it('fails immediately on a permanent provision error', async () => {
      const h = await createHarness();
      h.driver.provisionErrors.push(new ProviderError('invalid image', { statusCode: 422 }));

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      expect(h.driver.provisionCalls).toHaveLength(1);
      const current = await h.store.resources.getById(resource.id);
      expect(current?.status).toBe(ResourceStatus.Failed);
      expect(current?.lastError).toBe('invalid image');
    });

    it('fails with a credential error and never calls the driver when no credential exists', async () => {
      const h = await createHarness({ storeCredential: false });

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      const [task] = await h.store.tasks.listByResource(resource.id);
      expect(h.driver.provisionCalls).toHaveLength(0);
      expect(task.lastError?.code).toBe('CREDENTIAL.MISSING');
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Failed);
      expect(h.orchestrator.breakers.get(DRIVER_ID).snapshot().calls).toBe(0);
    });

    it('hands the decrypted credential to the driver and masks it in errors', async () => {
      const h = await createHarness();
      h.driver.provisionErrors.push(
        new ProviderError(`authentication failed for token ${TEST_SECRET}`, { statusCode: 401 }),
      );

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      expect(h.driver.provisionCalls[0].secret).toBe(TEST_SECRET);
      const current = await h.store.resources.getById(resource.id);
      expect(current?.lastError).toBe('authentication failed for token *************alue');
    });

    it('runs drivers that need no credential with a null secret', async () => {
      const h = await createHarness({ requiresCredential: false, storeCredential: false });
      h.driver.pollResults.push({ status: 'completed' });

      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();

      expect(h.driver.provisionCalls[0].secret).toBeNull();
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Active);
    });
  });

  describe('duplicate delivery', () => {
    it('ignores a second dispatch job for an accepted task', async () => {
      const h = await createHarness();
      const resource = await h.orchestrator.kick(makeOrder());
      const [task] = await h.store.tasks.listByResource(resource.id);
      await h.queue.enqueue({ kind: 'task.dispatch', taskId: task.id });

      await h.queue.drain(2);

      expect(h.driver.provisionCalls).toHaveLength(1);
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Provisioning);
    });

    it('lets only one of two concurrent dispatches reach the driver', async () => {
      const h = await createHarness();
      const resource = await h.orchestrator.kick(makeOrder());
      const [task] = await h.store.tasks.listByResource(resource.id);

      await Promise.all([h.orchestrator.runDispatch(task.id), h.orchestrator.runDispatch(task.id)]);

      expect(h.driver.provisionCalls).toHaveLength(1);
      expect((await h.store.tasks.getById(task.id))?.attempts).toBe(1);
    });

    it('drops a redelivered kick for an order that already has a resource', async () => {
      const h = await createHarness();
      await h.orchestrator.enqueueKick(makeOrder());
      await h.orchestrator.enqueueKick(makeOrder());

      await h.queue.drain(2);

      const resource = await h.store.resources.getByOrderId('ord_1');
      expect(resource?.status).toBe(ResourceStatus.Queued);
      expect(await h.store.tasks.listByResource(resource?.id ?? '')).toHaveLength(1);
    });
  });

  describe('webhooks', () => {
    it('completes the task from a webhook and skips the scheduled poll', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['webhooks'] }) });
      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain(1);
      expect(h.queue.size()).toBe(1);

      const [task] = await h.store.tasks.listByResource(resource.id);
      const outcome = await h.orchestrator.handleWebhook(
        DRIVER_ID,
        signedDelivery({ taskId: 'ptask_1', status: 'completed' }, h.clock.now()),
      );

      expect(outcome).toEqual({ handled: true, taskId: task.id, status: 'completed' });
      expect(h.queue.size()).toBe(0);
      expect(await h.orchestrator.poller.checkOnce(task.id)).toBe('skipped');
      expect(h.driver.pollCalls).toHaveLength(0);
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Active);
    });

    it('treats a repeated webhook as already handled', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['webhooks'] }) });
      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain(1);
      const [task] = await h.store.tasks.listByResource(resource.id);
      const delivery = signedDelivery({ taskId: 'ptask_1', status: 'completed' }, h.clock.now());

      await h.orchestrator.handleWebhook(DRIVER_ID, delivery);
      const again = await h.orchestrator.handleWebhook(DRIVER_ID, delivery);

      expect(again).toEqual({ handled: false, reason: 'already-terminal', taskId: task.id });
      expect(await h.orchestrator.getHistory(resource.id)).toHaveLength(3);
    });

    it('ignores webhooks for unknown provider tasks', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['webhooks'] }) });
      const outcome = await h.orchestrator.handleWebhook(
        DRIVER_ID,
        signedDelivery({ taskId: 'ptask_404', status: 'completed' }, h.clock.now()),
      );
      expect(outcome).toEqual({ handled: false, reason: 'unknown-task' });
    });

    it('rejects a webhook with a bad signature', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['webhooks'] }) });
      const delivery = signedDelivery({ taskId: 'ptask_1', status: 'completed' }, h.clock.now(), 'wrong-secret');
      await expectTypedError(h.orchestrator.handleWebhook(DRIVER_ID, delivery), 'WEBHOOK.SIGNATURE_INVALID');
    });

    it('rejects webhooks for a poll-only driver', async () => {
      const h = await createHarness();
      const delivery = signedDelivery({ taskId: 'ptask_1', status: 'completed' }, h.clock.now());
      await expectTypedError(h.orchestrator.handleWebhook(DRIVER_ID, delivery), 'CONTRACT.CAPABILITY_UNSUPPORTED');
    });

    it('applies a received webhook as a queued job', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['webhooks'] }) });
      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain(1);

      await h.orchestrator.receiveWebhook(
        DRIVER_ID,
        signedDelivery({ taskId: 'ptask_1', status: 'failed', message: 'out of capacity' }, h.clock.now()),
      );
      await h.queue.runDue();

      const current = await h.store.resources.getById(resource.id);
      expect(current?.status).toBe(ResourceStatus.Failed);
      expect(current?.lastError).toBe('out of capacity');
      expect(h.driver.pollCalls).toHaveLength(0);
    });
  });

  describe('operator actions', () => {
    it('suspends and resumes an active resource', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);

      const suspendTask = await h.orchestrator.suspend(resourceId, 'admin_1');
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Suspended);
      await h.queue.drain();
      expect(h.driver.lifecycleCalls[0]).toEqual({
        action: 'suspend',
        key: `ord_1/${suspendTask.id}:attempt_1`,
        resourceId,
      });

      await h.orchestrator.resume(resourceId, 'admin_1');
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Resuming);
      await h.queue.drain();

      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Active);
      const history = await h.orchestrator.getHistory(resourceId);
      expect(history.map((row) => [row.action, row.actor])).toEqual([
        ['queue', SYSTEM_ACTOR],
        ['provision.accepted', SYSTEM_ACTOR],
        ['driver.succeeded', SYSTEM_ACTOR],
        ['operator.suspend', 'admin_1'],
        ['operator.resume', 'admin_1'],
        ['driver.succeeded', SYSTEM_ACTOR],
      ]);
      expect(isValidHistory(history)).toBe(true);

      const events = await h.orchestrator.publisher.getEventsByResource(resourceId);
      expect(events.map((e) => e.type)).toEqual(['OrderPlaced', 'ResourceProvisioned', 'ResourceSuspended']);
    });

    it('returns the live task for a repeated suspend', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);

      const first = await h.orchestrator.suspend(resourceId, 'admin_1');
      const second = await h.orchestrator.suspend(resourceId, 'admin_1');

      expect(second.id).toBe(first.id);
      expect(await h.orchestrator.getHistory(resourceId)).toHaveLength(4);
    });

    it('answers two concurrent identical suspends with one task', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);

      const [first, second] = await Promise.all([
        h.orchestrator.suspend(resourceId, 'admin_1'),
        h.orchestrator.suspend(resourceId, 'admin_2'),
      ]);
      await h.queue.drain();

      expect(second.id).toBe(first.id);
      expect(h.driver.lifecycleCalls.map((call) => call.action)).toEqual(['suspend']);
      expect(await h.orchestrator.getHistory(resourceId)).toHaveLength(4);
    });

    it('refuses a different action racing a suspend and names the task in flight', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);

      const [suspended, resized] = await Promise.allSettled([
        h.orchestrator.suspend(resourceId, 'admin_1'),
        h.orchestrator.resize(resourceId, { planCode: 'cx21' }, 'admin_2'),
      ]);

      expect(suspended.status).toBe('fulfilled');
      expect(resized).toMatchObject({
        status: 'rejected',
        reason: { typedError: { code: 'STATE.CONFLICT', message: 'Cannot resize while a suspend task is in flight' } },
      });
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Suspended);
    });

    it('refuses a resume while the suspend is still running at the provider', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);
      h.driver.lifecycleResult = 'psus_1';

      const suspendTask = await h.orchestrator.suspend(resourceId, 'admin_1');
      await h.queue.runDue();
      expect((await h.store.tasks.getById(suspendTask.id))?.providerTaskId).toBe('psus_1');

      await expectTypedError(h.orchestrator.resume(resourceId, 'admin_1'), 'STATE.CONFLICT');
      expect(h.driver.lifecycleCalls.map((call) => call.action)).toEqual(['suspend']);

      h.driver.pollResults.push({ status: 'completed' });
      await h.queue.drain();

      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Suspended);
      expect((await h.store.tasks.getById(suspendTask.id))?.status).toBe(TaskStatus.Completed);
      const events = await h.orchestrator.publisher.getEventsByResource(resourceId);
      expect(events.map((e) => e.type)).toEqual(['OrderPlaced', 'ResourceProvisioned', 'ResourceSuspended']);
    });

    it('refuses an operator action that is illegal from the current status', async () => {
      const h = await createHarness();
      const resource = await h.orchestrator.kick(makeOrder());
      await expectTypedError(h.orchestrator.resume(resource.id, 'admin_1'), 'STATE.CONFLICT');
      expect(await h.orchestrator.getHistory(resource.id)).toHaveLength(1);
    });

    it('marks the resource FAILED when the provider rejects a suspend', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);
      h.driver.lifecycleErrors.push(new ProviderError('server locked', { statusCode: 409 }));

      await h.orchestrator.suspend(resourceId, 'admin_1');
      await h.queue.drain();

      const current = await h.store.resources.getById(resourceId);
      expect(current?.status).toBe(ResourceStatus.Failed);
      expect(current?.lastError).toBe('server locked');
    });

    it('refuses with DRIVER.UNAVAILABLE while the circuit is open', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);
      const breaker = h.orchestrator.breakers.get(DRIVER_ID);
      while (breaker.getState() !== CircuitState.Open) {
        await breaker.execute(() => Promise.reject(new ProviderError('down', { statusCode: 503 }))).catch(() => undefined);
      }

      await expectTypedError(h.orchestrator.suspend(resourceId, 'admin_1'), 'DRIVER.UNAVAILABLE');
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Active);
      expect(await h.store.tasks.findActive(resourceId, 'suspend')).toBeNull();
    });

    it('resizes an active resource and stores the new spec', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);

      await h.orchestrator.resize(resourceId, { planCode: 'cx21' }, 'admin_1');
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Updating);
      await h.queue.drain();

      const current = await h.store.resources.getById(resourceId);
      expect(current?.status).toBe(ResourceStatus.Active);
      expect(current?.planCode).toBe('cx21');
      expect(current?.spec.planCode).toBe('cx21');
      expect(current?.spec.extra).toEqual({ ipv6: true });
      expect(h.driver.lifecycleCalls[0].spec?.planCode).toBe('cx21');
    });

    it('rejects a resize without changes', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);
      await expectTypedError(h.orchestrator.resize(resourceId, {}, 'admin_1'), 'VALIDATION.SCHEMA');
    });

    it('reports unknown resources as not found', async () => {
      const h = await createHarness();
      await expectTypedError(h.orchestrator.suspend('res_missing', 'admin_1'), 'VALIDATION.NOT_FOUND');
    });
  });

  describe('deprovision', () => {
    it('tears down an active resource through a polled provider task', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);
      h.driver.lifecycleResult = 'pdel_1';
      h.driver.pollResults.push({ status: 'completed' });

      await h.orchestrator.deprovision(resourceId, 'admin_1');
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Deprovisioning);
      await h.queue.drain();

      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Deprovisioned);
      expect(h.driver.pollCalls[h.driver.pollCalls.length - 1]).toBe('pdel_1');
      const events = await h.orchestrator.publisher.getEventsByResource(resourceId);
      expect(events[events.length - 1].type).toBe('ResourceDeprovisioned');
      expect(isValidHistory(await h.orchestrator.getHistory(resourceId))).toBe(true);
    });

    it('stays DEPROVISIONING after a failed attempt and can be retried', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);
      h.driver.lifecycleErrors.push(new ProviderError('server protected', { statusCode: 403 }));

      const first = await h.orchestrator.deprovision(resourceId, 'admin_1');
      await h.queue.drain();
      let current = await h.store.resources.getById(resourceId);
      expect(current?.status).toBe(ResourceStatus.Deprovisioning);
      expect(current?.lastError).toBe('server protected');
      expect((await h.store.tasks.getById(first.id))?.status).toBe(TaskStatus.Failed);

      const second = await h.orchestrator.deprovision(resourceId, 'admin_1');
      expect(second.id).not.toBe(first.id);
      await h.queue.drain();

      current = await h.store.resources.getById(resourceId);
      expect(current?.status).toBe(ResourceStatus.Deprovisioned);
      const history = await h.orchestrator.getHistory(resourceId);
      expect(history.filter((row) => row.action === 'operator.deprovision')).toHaveLength(1);
    });

    it('completes locally when the provider never created anything', async () => {
      const h = await createHarness({ storeCredential: false });
      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Failed);

      const task = await h.orchestrator.deprovision(resource.id, 'admin_1');

      expect(task.status).toBe(TaskStatus.Completed);
      expect(h.driver.lifecycleCalls).toHaveLength(0);
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Deprovisioned);
    });

    it('supersedes other live tasks of the resource', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['metrics'] }) });
      const resourceId = await provisionActive(h);
      const syncTask = await h.orchestrator.sync(resourceId, 'admin_1');

      await h.orchestrator.deprovision(resourceId, 'admin_1');

      const superseded = await h.store.tasks.getById(syncTask.id);
      expect(superseded?.status).toBe(TaskStatus.Failed);
      expect(superseded?.lastError?.code).toBe('STATE.SUPERSEDED');
      expect(h.queue.size()).toBe(1);
      await h.queue.drain();
      expect(h.driver.healthCalls).toHaveLength(0);
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Deprovisioned);
    });

    it('joins a concurrent deprovision instead of calling the provider twice', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);

      const [first, second] = await Promise.all([
        h.orchestrator.deprovision(resourceId, 'admin_1'),
        h.orchestrator.deprovision(resourceId, 'admin_2'),
      ]);
      await h.queue.drain();

      expect(second.id).toBe(first.id);
      expect(h.driver.lifecycleCalls.map((call) => call.action)).toEqual(['deprovision']);
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Deprovisioned);
    });

    it('refuses to deprovision a resource twice once it is gone', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);
      await h.orchestrator.deprovision(resourceId, 'admin_1');
      await h.queue.drain();

      await expectTypedError(h.orchestrator.deprovision(resourceId, 'admin_1'), 'STATE.CONFLICT');
    });
  });

  describe('sync', () => {
    it('records provider-side suspension as drift', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['metrics'] }) });
      const resourceId = await provisionActive(h);
      h.driver.health = { state: 'suspended' };

      await h.orchestrator.sync(resourceId, 'admin_1');
      await h.queue.drain();

      const current = await h.store.resources.getById(resourceId);
      expect(current?.status).toBe(ResourceStatus.Suspended);
      expect(current?.lastSyncedAt).toBeDefined();
      const history = await h.orchestrator.getHistory(resourceId);
      expect(history[history.length - 1]).toMatchObject({
        action: 'sync.drift',
        actor: 'admin_1',
        statusBefore: ResourceStatus.Active,
        statusAfter: ResourceStatus.Suspended,
        metadata: { providerState: 'suspended' },
      });
    });

    it('walks a suspended resource back to ACTIVE when the provider reports it running', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['metrics'] }) });
      const resourceId = await provisionActive(h);
      await h.orchestrator.suspend(resourceId, 'admin_1');
      await h.queue.drain();
      h.driver.health = { state: 'running' };

      await h.orchestrator.sync(resourceId, 'admin_1');
      await h.queue.drain();

      const history = await h.orchestrator.getHistory(resourceId);
      expect(history.slice(-2).map((row) => row.statusAfter)).toEqual([ResourceStatus.Resuming, ResourceStatus.Active]);
      expect(isValidHistory(history)).toBe(true);
    });

    it('is a no-op while a suspend is still running at the provider', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['metrics'] }) });
      const resourceId = await provisionActive(h);
      h.driver.lifecycleResult = 'psus_1';
      const suspendTask = await h.orchestrator.suspend(resourceId, 'admin_1');
      await h.queue.runDue();
      h.driver.health = { state: 'running' };

      const answered = await h.orchestrator.sync(resourceId, 'admin_1');
      expect(answered.id).toBe(suspendTask.id);

      h.driver.pollResults.push({ status: 'completed' });
      await h.queue.drain();

      expect(h.driver.healthCalls).toHaveLength(0);
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Suspended);
      const events = await h.orchestrator.publisher.getEventsByResource(resourceId);
      expect(events.map((e) => e.type)).toEqual(['OrderPlaced', 'ResourceProvisioned', 'ResourceSuspended']);
    });

    it('steps aside when a lifecycle action starts after it was queued', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['metrics'] }) });
      const resourceId = await provisionActive(h);
      h.driver.health = { state: 'running' };

      const syncTask = await h.orchestrator.sync(resourceId, 'admin_1');
      await h.orchestrator.suspend(resourceId, 'admin_1');
      await h.queue.drain();

      expect(h.driver.healthCalls).toHaveLength(0);
      expect((await h.store.tasks.getById(syncTask.id))?.status).toBe(TaskStatus.Completed);
      expect((await h.store.resources.getById(resourceId))?.status).toBe(ResourceStatus.Suspended);
    });

    it('requires the metrics capability', async () => {
      const h = await createHarness();
      const resourceId = await provisionActive(h);
      await expectTypedError(h.orchestrator.sync(resourceId, 'admin_1'), 'CONTRACT.CAPABILITY_UNSUPPORTED');
    });
  });

  describe('capability pass-throughs', () => {
    it('reads inventory and metrics through the driver facets', async () => {
      const h = await createHarness({ driver: new FakeDriver({ capabilities: ['inventory', 'metrics'] }) });
      const resourceId = await provisionActive(h);

      expect(await h.orchestrator.inventory(DRIVER_ID, 'quotas')).toEqual({ servers: 10 });
      expect(await h.orchestrator.metrics(resourceId, 'costs')).toEqual({ currency: 'EUR', accruedMinor: 450 });
    });

    it('refuses inventory on a driver without it', async () => {
      const h = await createHarness();
      await expectTypedError(h.orchestrator.inventory(DRIVER_ID, 'regions'), 'CONTRACT.CAPABILITY_UNSUPPORTED');
    });
  });
});
