/**
 * @file Default Workflow State
 *
 * Counter bookkeeping for one workflow run. The counters obey
 * `jobsProcessed + jobsFailed <= jobCount`; `finishedAt` is set exactly
 * once and `cancelledAt` at most once.
 *
 * @module dag/state
 */

import type { WorkflowRecord } from '../store/types.js';
import type { WorkflowState } from './types.js';
import { InvalidStateTransitionError } from '../errors.js';

export class DefaultWorkflowState implements WorkflowState {
    constructor(private readonly record: WorkflowRecord) {}

    get workflowId(): string {
        return this.record.id;
    }

    allJobsFinished(): boolean {
        return this.record.jobsProcessed === this.record.jobCount;
    }

    hasRan(): boolean {
        return this.record.jobsProcessed + this.record.jobsFailed === this.record.jobCount;
    }

    isFinished(): boolean {
        return this.record.finishedAt !== null;
    }

    isCancelled(): boolean {
        return this.record.cancelledAt !== null;
    }

    finishedJobs(): ReadonlySet<string> {
        return new Set(this.record.finishedJobIds);
    }

    jobFinished_record(jobId: string): void {
        if (this.record.finishedJobIds.includes(jobId)) {
            throw new InvalidStateTransitionError(jobId, 'finished', 'record completion of');
        }
        this.capacity_check(jobId);
        this.record.finishedJobIds.push(jobId);
        this.record.jobsProcessed += 1;
    }

    jobFailed_record(jobId: string): void {
        this.capacity_check(jobId);
        this.record.jobsFailed += 1;
    }

    jobFailure_clear(jobId: string): void {
        if (this.record.jobsFailed === 0) {
            throw new InvalidStateTransitionError(jobId, 'not failed', 'clear the failure of');
        }
        this.record.jobsFailed -= 1;
    }

    finished_mark(now: Date): boolean {
        if (this.record.finishedAt !== null) return false;
        if (!this.allJobsFinished()) {
            throw new InvalidStateTransitionError(this.record.id, 'still running', 'finish');
        }
        this.record.finishedAt = now.toISOString();
        return true;
    }

    cancel(now: Date): boolean {
        if (this.record.cancelledAt !== null) return false;
        this.record.cancelledAt = now.toISOString();
        return true;
    }

    private capacity_check(jobId: string): void {
        if (this.record.jobsProcessed + this.record.jobsFailed >= this.record.jobCount) {
            throw new InvalidStateTransitionError(jobId, 'already accounted for', 'record');
        }
    }
}
