import { pollUntilTerminal } from '../client/poller';
import { JobNotFoundError, PollingError } from '../errors';
import type { JobStatusView } from '../projection';
import { JobStatus } from '../types';

function view(status: JobStatus): JobStatusView {
  return {
    jobId: 'job-7',
    status,
    stage: status === JobStatus.DONE ? 'done' : 'infer_video',
    progressPercent: status === JobStatus.DONE ? 100 : 55,
    label: 'x',
    updatedAt: '2024-05-01T10:00:00.000Z'
  };
}

type Step = JobStatus | Error | null;

function scripted(steps: Step[]) {
  let call = 0;
  return async (): Promise<JobStatusView | null> => {
    const step = steps[Math.min(call++, steps.length - 1)];
    if (step instanceof Error) throw step;
    return step === null ? null : view(step);
  };
}

describe('pollUntilTerminal', () => {
  let delays: number[];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };

  beforeEach(() => {
    delays = [];
  });

  it('should return the first terminal status', async () => {
    const updates: JobStatus[] = [];
    const final = await pollUntilTerminal(scripted([JobStatus.RUNNING, JobStatus.RUNNING, JobStatus.DONE]), {
      sleep,
      onUpdate: (status) => updates.push(status.status)
    });

    expect(final.status).toBe(JobStatus.DONE);
    expect(updates).toEqual([JobStatus.RUNNING, JobStatus.RUNNING, JobStatus.DONE]);
    expect(delays).toEqual([200, 200]);
  });

  it('should treat failed as terminal', async () => {
    const final = await pollUntilTerminal(scripted([JobStatus.PENDING, JobStatus.FAILED]), { sleep });

    expect(final.status).toBe(JobStatus.FAILED);
  });

  it('should back off after fetch errors', async () => {
    const boom = new Error('connection reset');
    const final = await pollUntilTerminal(scripted([boom, boom, JobStatus.DONE]), { sleep });

    expect(final.status).toBe(JobStatus.DONE);
    expect(delays).toEqual([200, 400]);
  });

  it('should cap the backoff interval', async () => {
    const boom = new Error('connection reset');
    await pollUntilTerminal(scripted([boom, boom, boom, JobStatus.DONE]), {
      sleep,
      intervalMs: 1000,
      backoffFactor: 10,
      maxIntervalMs: 5000
    });

    expect(delays).toEqual([1000, 5000, 5000]);
  });

  it('should reset the backoff after a successful poll', async () => {
    const boom = new Error('connection reset');
    await pollUntilTerminal(scripted([boom, JobStatus.RUNNING, boom, JobStatus.DONE]), { sleep, maxRetries: 1 });

    expect(delays).toEqual([200, 200, 200]);
  });

  it('should give up after too many consecutive errors', async () => {
    const poll = pollUntilTerminal(scripted([new Error('boom')]), { sleep, maxRetries: 2 });

    await expect(poll).rejects.toThrow(PollingError);
    await expect(poll).rejects.toMatchObject({
      message: 'Status polling failed after 3 consecutive errors: boom',
      attempts: 3
    });
    expect(delays).toEqual([200, 400]);
  });

  it('should stop at once when the job does not exist', async () => {
    const poll = pollUntilTerminal(scripted([null]), { sleep, jobId: 'job-7' });

    await expect(poll).rejects.toThrow(JobNotFoundError);
    await expect(poll).rejects.toThrow('Analysis job not found: job-7');
    expect(delays).toEqual([]);
  });

  it('should give up on a job that outlives the deadline', async () => {
    let clock = 0;
    const poll = pollUntilTerminal(scripted([JobStatus.RUNNING]), {
      jobId: 'job-7',
      intervalMs: 100,
      maxWaitMs: 250,
      now: () => clock,
      sleep: async (ms: number) => {
        delays.push(ms);
        clock += ms;
      }
    });

    await expect(poll).rejects.toMatchObject({
      message: 'Job job-7 is still running at stage infer_video after 250ms',
      attempts: 4
    });
    await expect(poll).rejects.toThrow(PollingError);
    expect(delays).toEqual([100, 100, 100]);
  });
});
