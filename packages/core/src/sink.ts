import { promises as fs } from 'node:fs';
import path from 'node:path';

import { formMetadataSchema, testRunSchema, type FormMetadata } from './schema.js';
import type { TestRun } from './types.js';

export interface RunSink {
  saveRun(run: TestRun): Promise<void>;
}

const RUN_FILE = 'TestRun.json';
const METADATA_FILE = 'FormMetadata.json';

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}

/** Writes each terminal run to `<root>/<runId>/TestRun.json`, next to its screenshots. */
export class FileRunSink implements RunSink {
  constructor(readonly root: string) {}

  runDir(runId: string): string {
    return path.join(this.root, runId);
  }

  async saveRun(run: TestRun): Promise<void> {
    const runDir = this.runDir(run.id);
    await fs.mkdir(runDir, { recursive: true });
    await fs.writeFile(path.join(runDir, RUN_FILE), JSON.stringify(run, null, 2), 'utf8');
  }

  async saveMetadata(runId: string, metadata: FormMetadata): Promise<void> {
    const runDir = this.runDir(runId);
    await fs.mkdir(runDir, { recursive: true });
    await fs.writeFile(path.join(runDir, METADATA_FILE), JSON.stringify(metadata, null, 2), 'utf8');
  }

  async loadRun(runId: string): Promise<TestRun> {
    const raw = await fs.readFile(path.join(this.runDir(runId), RUN_FILE), 'utf8');
    return testRunSchema.parse(JSON.parse(raw));
  }

  async loadMetadata(runId: string): Promise<FormMetadata> {
    const raw = await fs.readFile(path.join(this.runDir(runId), METADATA_FILE), 'utf8');
    return formMetadataSchema.parse(JSON.parse(raw));
  }

  /** Every stored run, oldest first. Directories without a readable TestRun.json are skipped. */
  async listRuns(): Promise<TestRun[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.root);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    const runs: TestRun[] = [];
    for (const entry of entries) {
      const runFile = path.join(this.root, entry, RUN_FILE);
      const raw = await fs.readFile(runFile, 'utf8').catch(() => undefined);
      if (raw === undefined) {
        continue;
      }
      const parsed = testRunSchema.safeParse(parseJson(raw));
      if (parsed.success) {
        runs.push(parsed.data);
      }
    }
    return runs.sort((left, right) => left.createdAt.localeCompare(right.createdAt));
  }
}

export class MemoryRunSink implements RunSink {
  readonly runs: TestRun[] = [];

  async saveRun(run: TestRun): Promise<void> {
    this.runs.push(run);
  }
}
