import { ResourceStatus } from '../../src/domain/resource';
import { TaskStatus } from '../../src/domain/task';
import { captureLogs, createHarness, makeOrder } from '../helpers/setup';

captureLogs();

describe('TaskPoller', () => {
  describe('computeDelay', () => {
    test('doubles from the base delay without jitter', async () => {
      const { orchestrator } = await createHarness();
      expect(orchestrator.poller.computeDelay(0)).toBe(2_000);
      expect(orchestrator.poller.computeDelay(1)).toBe(4_000);
      expect(orchestrator.poller.computeDelay(4)).toBe(32_000);
    });

    test('caps the exponential part at the maximum delay', async () => {
      const { orchestrator } = await createHarness();
      expect(orchestrator.poller.computeDelay(20)).toBe(300_000);
    });

    test('adds up to jitterRatio of the delay', async () => {
      const high = await createHarness({ random: () => 1 });
      expect(high.orchestrator.poller.computeDelay(0)).toBe(3_000);

      const mid = await createHarness({ random: () => 0.5 });
      expect(mid.orchestrator.poller.computeDelay(3)).toBe(20_000);
    });
  });

  describe('checkOnce', () => {
    test('skips a task the provider has not accepted yet', async () => {
      const h = await createHarness();
      const resource = await h.orchestrator.kick(makeOrder());
      const [task] = await h.store.tasks.listByResource(resource.id);

      expect(await h.orchestrator.poller.checkOnce(task.id)).toBe('skipped');
      expect(h.driver.pollCalls).toHaveLength(0);
    });

    test('skips an unknown task', async () => {
      const h = await createHarness();
      expect(await h.orchestrator.poller.checkOnce('task_missing')).toBe('skipped');
    });

    test('reschedules a pending task and counts the check', async () => {
      const h = await createHarness();
      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain(1);
      const [task] = await h.store.tasks.listByResource(resource.id);

      expect(await h.orchestrator.poller.checkOnce(task.id)).toBe('rescheduled');
      expect(await h.orchestrator.scheduler.attemptCount(task.id)).toBe(1);
      expect(await h.orchestrator.scheduler.attemptCount(task.id, 'dispatch')).toBe(1);
      expect(h.orchestrator.scheduler.scheduledCount(task.id)).toBe(2);
    });

    test('completes the task on a completed answer', async () => {
      const h = await createHarness();
      h.driver.pollResults.push({ status: 'completed', providerResourceId: 'srv-7' });
      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain(1);
      const [task] = await h.store.tasks.listByResource(resource.id);

      expect(await h.orchestrator.poller.checkOnce(task.id)).toBe('completed');
      expect((await h.store.tasks.getById(task.id))?.status).toBe(TaskStatus.Completed);
      expect((await h.store.resources.getById(resource.id))?.providerRef).toBe('srv-7');
      expect(h.queue.size()).toBe(0);
    });

    test('stops checking a resource that is being deprovisioned', async () => {
      const h = await createHarness();
      h.driver.pollResults.push({ status: 'completed' });
      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain();
      h.driver.pollCalls.length = 0;

      const task = await h.orchestrator.resize(resource.id, { planCode: 'cx21' }, 'admin_1');
      h.driver.lifecycleResult = 'presize_1';
      await h.queue.drain(1);
      await h.store.resources.commitTransition(resource.id, ResourceStatus.Updating, ResourceStatus.Deprovisioning, {}, {
        resourceId: resource.id,
        actor: 'admin_1',
        action: 'operator.deprovision',
        statusBefore: ResourceStatus.Updating,
        statusAfter: ResourceStatus.Deprovisioning,
        metadata: {},
      });

      expect(await h.orchestrator.poller.checkOnce(task.id)).toBe('skipped');
      expect(h.driver.pollCalls).toHaveLength(0);
      expect((await h.store.tasks.getById(task.id))?.status).toBe(TaskStatus.Pending);
    });

    test('fails with a timeout once the budget is already spent', async () => {
      const h = await createHarness({ config: { poller: { maxPollAttempts: 1 } } });
      const resource = await h.orchestrator.kick(makeOrder());
      await h.queue.drain(1);
      const [task] = await h.store.tasks.listByResource(resource.id);
      await h.store.tasks.recordPoll(task.id);

      expect(await h.orchestrator.poller.checkOnce(task.id)).toBe('timed-out');
      expect(h.driver.pollCalls).toHaveLength(0);
      expect((await h.store.resources.getById(resource.id))?.status).toBe(ResourceStatus.Failed);
    });
  });
});
