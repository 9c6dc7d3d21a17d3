/**
 * @file Workflow Progress
 *
 * Read-only views over persisted records for dashboards and tests:
 * per-status counts, the jobs a failure has cut off, and whether a run
 * has settled (nothing running and nothing left that could run without
 * someone stepping in).
 *
 * @module dag/inspect
 */

import type { JobRecord, WorkflowRecord } from '../store/types.js';
import type { JobStateFactory, JobStatus } from '../state/types.js';
import { DefaultJobState } from '../state/JobState.js';

/**
 * Progress of one run.
 *
 * @property excluded - Unfinished jobs downstream of a failed job
 * @property percent - Finished share of all jobs, 0-100 (100 for an empty run)
 * @property settled - No job is processing or gated, and every pending
 *   job is excluded (or the run was cancelled with nothing in flight)
 */
export interface WorkflowProgress {
    total: number;
    pending: number;
    gated: number;
    processing: number;
    finished: number;
    failed: number;
    excluded: number;
    percent: number;
    allJobsFinished: boolean;
    hasRan: boolean;
    isFinished: boolean;
    isCancelled: boolean;
    settled: boolean;
}

function status_resolver(factory: JobStateFactory | undefined): (job: JobRecord) => JobStatus {
    const create: JobStateFactory = factory ?? ((record: JobRecord): DefaultJobState => new DefaultJobState(record));
    return (job: JobRecord): JobStatus => create(job).status();
}

/**
 * Jobs with the given status, in sequence order.
 */
export function jobsByStatus_list(jobs: readonly JobRecord[], status: JobStatus, jobStateFactory?: JobStateFactory): JobRecord[] {
    const statusOf = status_resolver(jobStateFactory);
    return jobs
        .filter((job: JobRecord): boolean => statusOf(job) === status)
        .sort((a: JobRecord, b: JobRecord): number => a.sequence - b.sequence);
}

/**
 * Ids of unfinished jobs that depend, directly or transitively, on a
 * failed job. They cannot run in this run unless the failure is retried.
 */
export function excludedJobs_resolve(jobs: readonly JobRecord[], jobStateFactory?: JobStateFactory): Set<string> {
    const statusOf = status_resolver(jobStateFactory);
    const dependents = new Map<string, string[]>();
    for (const job of jobs) {
        for (const dependency of job.dependencies) {
            const list = dependents.get(dependency) ?? [];
            list.push(job.jobId);
            dependents.set(dependency, list);
        }
    }

    const byId = new Map(jobs.map((job: JobRecord): [string, JobRecord] => [job.jobId, job]));
    const stack: string[] = jobs
        .filter((job: JobRecord): boolean => statusOf(job) === 'failed')
        .flatMap((job: JobRecord): string[] => dependents.get(job.jobId) ?? []);

    const excluded = new Set<string>();
    while (stack.length > 0) {
        const id = stack.pop();
        if (id === undefined || excluded.has(id)) continue;
        const job = byId.get(id);
        if (job && statusOf(job) === 'finished') continue;
        excluded.add(id);
        stack.push(...(dependents.get(id) ?? []));
    }
    return excluded;
}

export function workflowProgress_resolve(
    workflow: Readonly<WorkflowRecord>,
    jobs: readonly JobRecord[],
    jobStateFactory?: JobStateFactory,
): WorkflowProgress {
    const statusOf = status_resolver(jobStateFactory);
    const counts: Record<JobStatus, number> = { pending: 0, gated: 0, processing: 0, finished: 0, failed: 0 };
    for (const job of jobs) {
        counts[statusOf(job)] += 1;
    }

    const excluded = excludedJobs_resolve(jobs, jobStateFactory);
    const isCancelled = workflow.cancelledAt !== null;
    const pendingRunnable = jobs.filter((job: JobRecord): boolean =>
        statusOf(job) === 'pending' && !excluded.has(job.jobId)).length;

    const idle = counts.processing === 0;
    const settled = isCancelled ? idle : idle && counts.gated === 0 && pendingRunnable === 0;

    return {
        total: jobs.length,
        ...counts,
        excluded: excluded.size,
        percent: jobs.length === 0 ? 100 : Math.round((counts.finished / jobs.length) * 100),
        allJobsFinished: workflow.jobsProcessed === workflow.jobCount,
        hasRan: workflow.jobsProcessed + workflow.jobsFailed === workflow.jobCount,
        isFinished: workflow.finishedAt !== null,
        isCancelled,
        settled,
    };
}
