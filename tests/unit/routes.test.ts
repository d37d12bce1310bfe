import { EventEmitter } from 'events';
import type { Request, Response } from 'express';
import { track } from '../../src/routes';
import { ServiceMetrics } from '../../src/services/metrics';

describe('request tracking', () => {
  const run = (metrics: ServiceMetrics | undefined) => {
    const res = new EventEmitter();
    const next = jest.fn();
    track(metrics, '/analyze')({} as Request, res as unknown as Response, next);
    return { res, next };
  };

  const durationCount = async (metrics: ServiceMetrics) =>
    (await metrics.exposition())
      .split('\n')
      .find(line => line.startsWith('highload_request_duration_seconds_count{endpoint="/analyze"}'));

  it('observes latency once when the response finishes and the connection closes', async () => {
    const metrics = new ServiceMetrics();
    const { res, next } = run(metrics);

    res.emit('finish');
    res.emit('close');

    expect(next).toHaveBeenCalledTimes(1);
    expect(await durationCount(metrics)).toBe('highload_request_duration_seconds_count{endpoint="/analyze"} 1');
  });

  it('observes latency when the client aborts before the response finishes', async () => {
    const metrics = new ServiceMetrics();
    const { res } = run(metrics);

    res.emit('close');

    expect(await durationCount(metrics)).toBe('highload_request_duration_seconds_count{endpoint="/analyze"} 1');
    expect((await metrics.exposition()).split('\n')).toContain('highload_requests_total{endpoint="/analyze"} 1');
  });

  it('passes through without metrics', () => {
    const { next } = run(undefined);

    expect(next).toHaveBeenCalledTimes(1);
  });
});
