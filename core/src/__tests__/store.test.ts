import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { InvalidTransitionError, JobConflictError, JobImmutableError, JobNotFoundError } from '../errors';
import { createJob } from '../index';
import { FileJobStore } from '../store/file';
import { InMemoryJobStore } from '../store/memory';
import type { JobStore } from '../store/types';
import { AnalysisJob, JobStatus, Verdict } from '../types';
import { mediaFor, mp4Bytes } from './fixtures';

function newJob(id = 'job-1'): AnalysisJob {
  return createJob(mediaFor('holiday.mp4', 'video/mp4', mp4Bytes()), id);
}

function claim(job: AnalysisJob): AnalysisJob {
  if (job.status !== JobStatus.PENDING) {
    throw new JobConflictError(`already ${job.status}`);
  }
  return { ...job, status: JobStatus.RUNNING, stage: 'validating' };
}

function sharedBehaviour(name: string, makeStore: () => Promise<JobStore>) {
  describe(name, () => {
    let store: JobStore;

    beforeEach(async () => {
      store = await makeStore();
    });

    it('should store and return a job', async () => {
      const job = newJob();
      await store.create(job);

      expect(await store.get('job-1')).toEqual(job);
      expect(await store.get('job-2')).toBeNull();
    });

    it('should refuse to create the same id twice', async () => {
      await store.create(newJob());

      await expect(store.create(newJob())).rejects.toThrow(JobConflictError);
    });

    it('should apply an update as a whole snapshot', async () => {
      await store.create(newJob());
      const updated = await store.update('job-1', claim);

      expect(updated.status).toBe(JobStatus.RUNNING);
      expect(updated.stage).toBe('validating');
      expect(await store.get('job-1')).toEqual(updated);
    });

    it('should fail updates of unknown jobs', async () => {
      await expect(store.update('job-9', claim)).rejects.toThrow(JobNotFoundError);
    });

    it('should reject stage skips and leave the record alone', async () => {
      await store.create(newJob());
      const before = await store.get('job-1');

      await expect(
        store.update('job-1', (job) => ({ ...job, status: JobStatus.RUNNING, stage: 'extracting' }))
      ).rejects.toThrow(InvalidTransitionError);
      expect(await store.get('job-1')).toEqual(before);
    });

    it('should reject a score on an unfinished job', async () => {
      await store.create(newJob());
      await store.update('job-1', claim);

      await expect(
        store.update('job-1', (job) => ({ ...job, overallScore: 0.5, verdict: Verdict.SUSPICIOUS }))
      ).rejects.toThrow('overall score and verdict exist only once done');
    });

    it('should refuse every write once a job has failed', async () => {
      await store.create(newJob());
      await store.update('job-1', (job) => ({ ...job, status: JobStatus.FAILED, errorMessage: 'stopped' }));

      await expect(store.update('job-1', claim)).rejects.toThrow(JobImmutableError);
      expect((await store.get('job-1'))?.status).toBe(JobStatus.FAILED);
    });

    it('should serialise concurrent claims', async () => {
      await store.create(newJob());
      const outcomes = await Promise.allSettled([store.update('job-1', claim), store.update('job-1', claim)]);

      expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(1);
      expect(outcomes.filter((o) => o.status === 'rejected')).toHaveLength(1);
    });

    it('should list jobs', async () => {
      await store.create(newJob('job-b'));
      await store.create(newJob('job-a'));

      const ids = (await store.list()).map((job) => job.id).sort();
      expect(ids).toEqual(['job-a', 'job-b']);
    });
  });
}

describe('Job stores', () => {
  const directories: string[] = [];

  afterAll(async () => {
    await Promise.all(directories.map((dir) => fs.remove(dir)));
  });

  async function tempDir(): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'veriframe-store-'));
    directories.push(dir);
    return dir;
  }

  sharedBehaviour('InMemoryJobStore', async () => new InMemoryJobStore());
  sharedBehaviour('FileJobStore', async () => new FileJobStore(await tempDir()));

  describe('InMemoryJobStore snapshots', () => {
    it('should hand out frozen snapshots', async () => {
      const store = new InMemoryJobStore();
      const job = await store.create(newJob());

      expect(Object.isFrozen(job)).toBe(true);
      expect(() => job.result.segments.push({
        startMs: 0,
        endMs: 1,
        segmentType: 'video',
        score: 1,
        reason: 'tampering'
      })).toThrow(TypeError);
    });

    it('should not let the caller keep a handle on stored data', async () => {
      const store = new InMemoryJobStore();
      const job = newJob();
      await store.create(job);
      job.media.filename = 'changed.mp4';

      expect((await store.get('job-1'))?.media.filename).toBe('holiday.mp4');
    });
  });

  describe('FileJobStore records', () => {
    it('should share records between store instances', async () => {
      const dir = await tempDir();
      await new FileJobStore(dir).create(newJob());
      await new FileJobStore(dir).update('job-1', claim);

      expect((await new FileJobStore(dir).get('job-1'))?.status).toBe(JobStatus.RUNNING);
    });

    it('should serialise claims from separate instances through lock files', async () => {
      const dir = await tempDir();
      await new FileJobStore(dir).create(newJob());

      const outcomes = await Promise.allSettled([
        new FileJobStore(dir).update('job-1', claim),
        new FileJobStore(dir).update('job-1', claim)
      ]);

      expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(1);
      expect(await fs.readdir(dir)).toEqual(['job-1.json']);
    });

    it('should not resolve ids outside its directory', async () => {
      const store = new FileJobStore(await tempDir());

      expect(await store.get('../job-1')).toBeNull();
    });

    it('should reject corrupt records', async () => {
      const dir = await tempDir();
      await fs.writeJson(path.join(dir, 'job-1.json'), { id: 'job-1' });

      await expect(new FileJobStore(dir).get('job-1')).rejects.toThrow('Corrupt analysis job record');
    });
  });
});
