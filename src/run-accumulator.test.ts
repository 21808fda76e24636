import { describe, it, expect } from 'vitest';
import { buildRecord } from './extractor';
import { RunAccumulator } from './run-accumulator';
import { outcomeFor } from './test-support';

const URL_A = 'https://shop.test/p/a';

describe('RunAccumulator', () => {
  it('should count pages by status', () => {
    const times = [new Date('2024-01-01T00:00:00.000Z'), new Date('2024-01-01T00:00:07.500Z')];
    const run = new RunAccumulator('pdp', () => times.shift() ?? new Date(0));
    const record = buildRecord({ mode: 'pdp', sourceUrl: URL_A, finalUrl: URL_A, currency: 'MXN' }, { title: 'Widget' });

    run.add({ pageIndex: 1, outcome: outcomeFor(URL_A), records: [record] });
    run.add({ pageIndex: 2, outcome: outcomeFor('https://shop.test/p/b', 'BLOCK'), records: [] });
    run.add({ pageIndex: 3, outcome: outcomeFor('https://shop.test/p/c', 'TIMEOUT', 3), records: [] });
    run.add({ pageIndex: 4, outcome: outcomeFor('https://shop.test/p/d', 'ERROR', 3), records: [] });

    expect(run.finish().summary).toEqual({
      mode: 'pdp',
      attempted: 4,
      succeeded: 1,
      blocked: 1,
      timedOut: 1,
      errored: 1,
      partial: 0,
      records: 1,
      navigationAttempts: 8,
      stopReason: null,
      startedAt: '2024-01-01T00:00:00.000Z',
      finishedAt: '2024-01-01T00:00:07.500Z',
      durationMs: 7500,
    });
  });

  it('should carry the stop reason', () => {
    const run = new RunAccumulator('plp');
    expect(run.stopped).toBe(false);

    run.stop({ reason: 'max-pages', pageIndex: 3, url: 'https://shop.test/c?page=4' });

    expect(run.stopped).toBe(true);
    expect(run.finish().summary.stopReason).toEqual({ reason: 'max-pages', pageIndex: 3, url: 'https://shop.test/c?page=4' });
  });

  it('should freeze the result and refuse new pages', () => {
    const run = new RunAccumulator('pdp');
    const result = run.finish();

    expect(run.finish()).toBe(result);
    expect(Object.isFrozen(result)).toBe(true);
    expect(() => run.add({ pageIndex: 1, outcome: outcomeFor(URL_A), records: [] })).toThrow('Run already finished');
  });
});
