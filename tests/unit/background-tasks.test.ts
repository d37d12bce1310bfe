import { BackgroundTaskRunner } from '../../src/services/background-tasks';
import { createMockLogger } from '../helpers/mock-logger';

describe('BackgroundTaskRunner', () => {
  it('runs tasks after the submitting call returns', async () => {
    const runner = new BackgroundTaskRunner(createMockLogger());
    let ran = false;

    runner.submit('flag', () => {
      ran = true;
    });

    expect(ran).toBe(false);
    expect(runner.pending).toBe(1);

    await runner.idle();

    expect(ran).toBe(true);
    expect(runner.pending).toBe(0);
  });

  it('logs and drops a failing task', async () => {
    const logger = createMockLogger();
    const runner = new BackgroundTaskRunner(logger);

    runner.submit('sync-failure', () => {
      throw new Error('kaput');
    });
    runner.submit('async-failure', async () => {
      throw new Error('offline');
    });
    await runner.idle();

    expect(runner.failedCount).toBe(2);
    expect(logger.error).toHaveBeenCalledWith('Background task failed', { task: 'sync-failure', error: 'kaput' });
    expect(logger.error).toHaveBeenCalledWith('Background task failed', { task: 'async-failure', error: 'offline' });
  });

  it('waits for tasks submitted by other tasks', async () => {
    const runner = new BackgroundTaskRunner(createMockLogger());
    const order: string[] = [];

    runner.submit('outer', () => {
      order.push('outer');
      runner.submit('inner', () => {
        order.push('inner');
      });
    });
    await runner.idle();

    expect(order).toEqual(['outer', 'inner']);
    expect(runner.pending).toBe(0);
  });
});
