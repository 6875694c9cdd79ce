import { describe, expect, it } from 'vitest';

import { AnalyticsAggregator } from '../src/analytics.js';
import { RunScheduler, type SchedulerOptions } from '../src/scheduler.js';
import { MemoryRunSink } from '../src/sink.js';
import { Synthesizer } from '../src/synthesizer.js';
import { isTerminal } from '../src/types.js';
import { FakeSessionFactory, signupForm, type FakeScript } from './fakes.js';

function createScheduler(
  script: FakeScript | ((runId: string) => FakeScript),
  overrides: Partial<SchedulerOptions> = {}
) {
  const sessions = new FakeSessionFactory(script);
  const sink = new MemoryRunSink();
  let counter = 0;
  const scheduler = new RunScheduler({
    sessions,
    synthesizer: new Synthesizer(),
    sink,
    maxConcurrency: 2,
    runTimeoutMs: 5_000,
    hardTimeoutGraceMs: 1_000,
    seed: 1,
    idFactory: () => {
      counter += 1;
      return `run-${counter}`;
    },
    ...overrides
  });
  return { scheduler, sessions, sink };
}

describe('RunScheduler', () => {
  it('rejects a non-positive concurrency limit', () => {
    expect(() => createScheduler({}, { maxConcurrency: 0 })).toThrow(
      'maxConcurrency must be a positive integer, got 0'
    );
  });

  it('returns pending snapshots and runs at most maxConcurrency at once', async () => {
    const { scheduler, sessions } = createScheduler({ navigateDelayMs: 20 });

    const runs = scheduler.submitRun(signupForm(), ['valid', 'invalid', 'edgeCase', 'boundary', 'valid']);

    expect(runs.map((run) => run.status)).toEqual(['pending', 'pending', 'pending', 'pending', 'pending']);
    expect(runs.map((run) => run.id)).toEqual(['run-1', 'run-2', 'run-3', 'run-4', 'run-5']);
    expect(scheduler.runningCount()).toBe(2);
    expect(scheduler.queuedCount()).toBe(3);

    await scheduler.idle();

    expect(sessions.maxActive).toBe(2);
    expect(sessions.browsers).toHaveLength(5);
    expect(sessions.browsers.every((browser) => browser.closed)).toBe(true);
    expect(scheduler.listRuns().every((run) => isTerminal(run.status))).toBe(true);
    expect(scheduler.getRun('run-1')?.status).toBe('passed');
    expect(scheduler.getRun('run-2')?.status).toBe('failed');
  });

  it('starts queued runs in submission order', async () => {
    const opened: string[] = [];
    const { scheduler } = createScheduler(
      (runId) => {
        opened.push(runId);
        return {};
      },
      { maxConcurrency: 1 }
    );

    scheduler.submitRun(signupForm(), ['valid', 'invalid', 'boundary']);
    await scheduler.idle();

    expect(opened).toEqual(['run-1', 'run-2', 'run-3']);
  });

  it('creates one run per distinct scenario', async () => {
    const { scheduler } = createScheduler({});

    const runs = scheduler.submitRun(signupForm(), ['valid', 'valid', 'invalid', 'valid']);
    await scheduler.idle();

    expect(runs.map((run) => [run.id, run.scenario])).toEqual([
      ['run-1', 'valid'],
      ['run-2', 'invalid']
    ]);
    expect(scheduler.listRuns()).toHaveLength(2);
  });

  it('hands every terminal run to the sink exactly once', async () => {
    const { scheduler, sink } = createScheduler({});

    scheduler.submitRun(signupForm(), ['valid', 'invalid']);
    await scheduler.idle();

    expect(sink.runs.map((run) => run.id).sort()).toEqual(['run-1', 'run-2']);
    expect(sink.runs.every((run) => isTerminal(run.status))).toBe(true);
  });

  it('publishes terminal runs to analytics', async () => {
    const analytics = new AnalyticsAggregator();
    const { scheduler } = createScheduler({}, { analytics });

    scheduler.submitRun(signupForm(), ['valid']);
    await scheduler.idle();
    await analytics.settled();

    expect(analytics.snapshot().totalRuns).toBe(1);
    expect(analytics.snapshot().byStatus.passed).toBe(1);
  });

  it('answers cancel for unknown and finished runs', async () => {
    const { scheduler } = createScheduler({});

    const [run] = scheduler.submitRun(signupForm(), ['valid']);
    await scheduler.idle();

    expect(scheduler.cancelRun('missing')).toEqual({ runId: 'missing', outcome: 'not-found', status: null });
    expect(scheduler.cancelRun(run?.id ?? '')).toEqual({ runId: 'run-1', outcome: 'noop', status: 'passed' });
  });

  it('cancels a queued run without opening a session', async () => {
    const { scheduler, sessions } = createScheduler({ navigateDelayMs: 10 }, { maxConcurrency: 1 });

    scheduler.submitRun(signupForm(), ['valid', 'invalid']);
    const ack = scheduler.cancelRun('run-2');
    await scheduler.idle();

    expect(ack).toEqual({ runId: 'run-2', outcome: 'cancelled', status: 'cancelled' });
    expect(sessions.browsers).toHaveLength(1);
    const cancelled = scheduler.getRun('run-2');
    expect(cancelled?.cancelCause).toBe('requested');
    expect(cancelled?.screenshots).toEqual([]);
    expect(scheduler.getRun('run-1')?.status).toBe('passed');
  });

  it('cancels a running run cooperatively', async () => {
    const { scheduler } = createScheduler({ navigateDelayMs: 20 });

    scheduler.submitRun(signupForm(), ['valid']);
    const ack = scheduler.cancelRun('run-1');
    await scheduler.idle();

    expect(ack).toEqual({ runId: 'run-1', outcome: 'cancelling', status: 'running' });
    expect(scheduler.getRun('run-1')).toMatchObject({
      status: 'cancelled',
      cancelCause: 'requested',
      errorSummary: 'Run cancelled on request'
    });
  });

  it('rejects runs beyond the queue limit as overloaded', async () => {
    const { scheduler, sink } = createScheduler({}, { maxConcurrency: 1, maxQueueSize: 1 });

    const runs = scheduler.submitRun(signupForm(), ['valid', 'invalid', 'edgeCase']);

    expect(runs.map((run) => run.status)).toEqual(['pending', 'pending', 'errored']);
    expect(runs[2]?.errorSummary).toBe('Overloaded: run queue is full (1 waiting)');

    await scheduler.idle();
    expect(sink.runs).toHaveLength(3);
  });

  it('cancels a run that outlives its timeout', async () => {
    const { scheduler } = createScheduler({ navigateDelayMs: 60 }, { runTimeoutMs: 20, hardTimeoutGraceMs: 1_000 });

    scheduler.submitRun(signupForm(), ['valid']);
    await scheduler.idle();

    expect(scheduler.getRun('run-1')).toMatchObject({
      status: 'cancelled',
      cancelCause: 'timeout',
      errorSummary: 'Run timed out'
    });
  });

  it('finalizes a run whose browser never answers', async () => {
    const { scheduler, sessions } = createScheduler(
      { hangOnNavigate: true },
      { runTimeoutMs: 20, hardTimeoutGraceMs: 20 }
    );

    scheduler.submitRun(signupForm(), ['valid']);
    await scheduler.idle();

    expect(scheduler.getRun('run-1')).toMatchObject({
      status: 'cancelled',
      cancelCause: 'timeout',
      errorSummary: 'Run timed out (hard timeout)'
    });
    expect(sessions.browsers[0]?.closed).toBe(true);
    expect(scheduler.runningCount()).toBe(0);
  });

  it('records metadata for accepted runs only', async () => {
    const accepted: string[] = [];
    const { scheduler } = createScheduler(
      {},
      {
        maxConcurrency: 1,
        maxQueueSize: 0,
        onAccepted: async (runId) => {
          accepted.push(runId);
        }
      }
    );

    scheduler.submitRun(signupForm(), ['valid', 'invalid']);
    await scheduler.idle();

    expect(accepted).toEqual(['run-1']);
  });
});
