export type WorkerPoolResult<TJob, TResult> =
  | { job: TJob; ok: true; value: TResult }
  | { job: TJob; ok: false; error: unknown };

/**
 * Drains a job queue with at most `concurrency` jobs in flight. A failing job
 * is captured in its result slot and never stops the remaining jobs.
 * Results keep the input order.
 */
export class BoundedWorkerPool {
  private readonly concurrency: number;

  constructor(concurrency: number) {
    this.concurrency = Number.isFinite(concurrency)
      ? Math.max(1, Math.floor(concurrency))
      : 1;
  }

  async run<TJob, TResult>(
    jobs: readonly TJob[],
    worker: (job: TJob) => Promise<TResult>,
  ): Promise<Array<WorkerPoolResult<TJob, TResult>>> {
    const results: Array<WorkerPoolResult<TJob, TResult>> = new Array(
      jobs.length,
    );
    let nextIndex = 0;

    const drain = async (): Promise<void> => {
      while (nextIndex < jobs.length) {
        const index = nextIndex;
        nextIndex += 1;
        const job = jobs[index];
        try {
          results[index] = { job, ok: true, value: await worker(job) };
        } catch (error: unknown) {
          results[index] = { job, ok: false, error };
        }
      }
    };

    const workerCount = Math.min(this.concurrency, jobs.length);
    await Promise.all(Array.from({ length: workerCount }, () => drain()));
    return results;
  }
}
