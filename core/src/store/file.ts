import fs from 'fs-extra';
import path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { JobConflictError, JobNotFoundError } from '../errors';
import { isStage } from '../pipeline/stages';
import { AnalysisJob, JobStatus } from '../types';
import { assertConsistent, assertTransition, assertWritable } from './guard';
import { KeyedMutex } from './lock';
import type { JobChange, JobStore } from './types';

const JOB_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

const LOCK_RETRY_MS = 10;
const LOCK_STALE_MS = 10_000;

const STATUSES: readonly string[] = Object.values(JobStatus);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAnalysisJobRecord(value: unknown): value is AnalysisJob {
  if (!isObject(value)) return false;
  return (
    typeof value.id === 'string' &&
    isObject(value.media) &&
    isStage(value.stage) &&
    typeof value.status === 'string' &&
    STATUSES.includes(value.status) &&
    isObject(value.result) &&
    Array.isArray(value.result.segments) &&
    typeof value.createdAt === 'string' &&
    typeof value.updatedAt === 'string'
  );
}

/**
 * One JSON document per job. Writes go to a temp file that is renamed over
 * the record, so another process polling the directory reads whole snapshots.
 */
export class FileJobStore implements JobStore {
  private mutex = new KeyedMutex();

  constructor(private readonly directory: string) {}

  private pathFor(id: string): string {
    if (!JOB_ID_PATTERN.test(id)) {
      throw new JobNotFoundError(id);
    }
    return path.join(this.directory, `${id}.json`);
  }

  /**
   * Cross-process guard around a record: an exclusive lock file beside it.
   * Locks left behind by a crashed process expire after LOCK_STALE_MS.
   */
  private async withFileLock<T>(id: string, work: () => Promise<T>): Promise<T> {
    const lock = `${this.pathFor(id)}.lock`;
    await fs.ensureDir(this.directory);
    for (;;) {
      try {
        await fs.writeFile(lock, String(process.pid), { flag: 'wx' });
        break;
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) throw error;
        const stat = await fs.stat(lock).catch(() => null);
        if (stat && Date.now() - stat.mtimeMs > LOCK_STALE_MS) {
          await fs.remove(lock);
        } else {
          await sleep(LOCK_RETRY_MS);
        }
      }
    }
    try {
      return await work();
    } finally {
      await fs.remove(lock);
    }
  }

  private async write(job: AnalysisJob): Promise<void> {
    const target = this.pathFor(job.id);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.ensureDir(this.directory);
    await fs.writeJson(temp, job, { spaces: 2 });
    await fs.move(temp, target, { overwrite: true });
  }

  private async read(file: string): Promise<AnalysisJob> {
    const raw: unknown = await fs.readJson(file);
    if (!isAnalysisJobRecord(raw)) {
      throw new Error(`Corrupt analysis job record: ${file}`);
    }
    return raw;
  }

  async create(job: AnalysisJob): Promise<AnalysisJob> {
    return this.mutex.run(job.id, () => this.withFileLock(job.id, async () => {
      if (await fs.pathExists(this.pathFor(job.id))) {
        throw new JobConflictError(`Analysis job already exists: ${job.id}`);
      }
      assertConsistent(job);
      await this.write(job);
      return job;
    }));
  }

  async get(id: string): Promise<AnalysisJob | null> {
    if (!JOB_ID_PATTERN.test(id)) return null;
    const file = this.pathFor(id);
    if (!(await fs.pathExists(file))) return null;
    return this.read(file);
  }

  async update(id: string, change: JobChange): Promise<AnalysisJob> {
    return this.mutex.run(id, () => this.withFileLock(id, async () => {
      const existing = await this.get(id);
      if (!existing) throw new JobNotFoundError(id);
      assertWritable(existing);

      const next: AnalysisJob = { ...change(existing), updatedAt: new Date().toISOString() };
      assertTransition(existing, next);
      await this.write(next);
      return next;
    }));
  }

  async list(): Promise<AnalysisJob[]> {
    if (!(await fs.pathExists(this.directory))) return [];
    const entries = await fs.readdir(this.directory);
    const jobs: AnalysisJob[] = [];
    for (const entry of entries.filter((name) => name.endsWith('.json')).sort()) {
      jobs.push(await this.read(path.join(this.directory, entry)));
    }
    return jobs;
  }
}
