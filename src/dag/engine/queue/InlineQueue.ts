/**
 * @file Inline Queue
 *
 * Runs jobs in this process through a handler function and reports the
 * outcome back to the engine. A handler that throws (or rejects) is a
 * job failure. Jobs never run inside the `dispatch` call itself, so the
 * engine's lock is released before a report comes back.
 *
 * `drain()` waits until nothing is running, including jobs dispatched by
 * reports that arrived while draining.
 *
 * @module dag/engine/queue
 */

import type { DispatchRequest, JobQueue, JobReporter } from '../types.js';

export type JobHandler<P> = (request: DispatchRequest<P>) => void | Promise<void>;

export interface InlineQueueOptions {
    /** Wait out each request's delay before running it. Default true. */
    delays?: boolean;
}

export class InlineQueue<P> implements JobQueue<P> {
    private reporter: JobReporter | null = null;
    private readonly inFlight = new Set<Promise<void>>();
    private readonly errors: unknown[] = [];
    private readonly delays: boolean;

    constructor(
        private readonly handler: JobHandler<P>,
        options: InlineQueueOptions = {},
    ) {
        this.delays = options.delays ?? true;
    }

    reporter_attach(reporter: JobReporter): void {
        this.reporter = reporter;
    }

    dispatch(request: DispatchRequest<P>): void {
        const task: Promise<void> = this.delay_wait(request)
            .then((): Promise<void> => this.job_run(request))
            .catch((e: unknown): void => {
                this.errors.push(e);
            })
            .then((): void => {
                this.inFlight.delete(task);
            });
        this.inFlight.add(task);
    }

    /** Number of jobs waiting or running. */
    get size(): number {
        return this.inFlight.size;
    }

    /**
     * Resolve once no job is waiting or running.
     *
     * @throws The first error raised while reporting an outcome
     */
    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
        const [first] = this.errors.splice(0);
        if (first !== undefined) throw first;
    }

    private delay_wait(request: DispatchRequest<P>): Promise<void> {
        const delay = this.delays ? request.delay ?? 0 : 0;
        if (delay <= 0) return Promise.resolve();
        return new Promise((resolve: () => void): void => {
            setTimeout(resolve, delay);
        });
    }

    private async job_run(request: DispatchRequest<P>): Promise<void> {
        const reporter = this.reporter;
        if (!reporter) {
            throw new Error(`InlineQueue cannot run '${request.jobId}': no reporter attached`);
        }

        let failure: { error: unknown } | null = null;
        try {
            await this.handler(request);
        } catch (e: unknown) {
            failure = { error: e };
        }

        if (failure) {
            await reporter.job_failed(request.workflowId, request.jobId, failure.error);
        } else {
            await reporter.job_finished(request.workflowId, request.jobId);
        }
    }
}
