import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { RunRecord } from '../src/run-record.js';
import { FileRunSink } from '../src/sink.js';
import { signupForm } from './fakes.js';

function finishedRun(id: string) {
  const record = new RunRecord(id, 'signup', 'valid');
  record.markRunning();
  record.addStep({ fieldName: 'email', semanticType: 'email', action: 'fill', status: 'ok', timestampOffset: 3 });
  record.recordSubmission(true, 'success');
  record.finish('passed');
  return record.snapshot();
}

describe('FileRunSink', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'formprobe-sink-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes and reads back a run', async () => {
    const sink = new FileRunSink(root);
    const run = finishedRun('run-a');

    await sink.saveRun(run);

    expect(await sink.loadRun('run-a')).toEqual(run);
  });

  it('stores the form metadata beside the run', async () => {
    const sink = new FileRunSink(root);

    await sink.saveMetadata('run-a', signupForm());

    expect(await sink.loadMetadata('run-a')).toEqual(signupForm());
  });

  it('lists stored runs and skips directories without one', async () => {
    const sink = new FileRunSink(root);
    await sink.saveRun(finishedRun('run-a'));
    await sink.saveRun(finishedRun('run-b'));
    await mkdir(path.join(root, 'scratch'));

    const runs = await sink.listRuns();

    expect(runs.map((run) => run.id).sort()).toEqual(['run-a', 'run-b']);
  });

  it('skips a run file that was cut off mid-write', async () => {
    const sink = new FileRunSink(root);
    await sink.saveRun(finishedRun('run-a'));
    await mkdir(path.join(root, 'run-b'));
    await writeFile(path.join(root, 'run-b', 'TestRun.json'), '{"id": "run-b", "sta', 'utf8');

    const runs = await sink.listRuns();

    expect(runs.map((run) => run.id)).toEqual(['run-a']);
  });

  it('lists nothing when the root does not exist', async () => {
    expect(await new FileRunSink(path.join(root, 'missing')).listRuns()).toEqual([]);
  });
});
