/**
 * @file Default Job State
 *
 * Derives a job's status from the timestamps on its record:
 *
 *   failedAt   → failed
 *   finishedAt → finished
 *   startedAt  → processing
 *   gatedAt    → gated
 *   (none)     → pending
 *
 * Each mark method checks the current status first and throws
 * InvalidStateTransitionError when the move is not allowed.
 *
 * @module dag/state
 */

import type { JobException, JobRecord } from '../store/types.js';
import type { JobState, JobStatus, JobTransition } from './types.js';
import { InvalidStateTransitionError } from '../errors.js';

/**
 * Convert anything thrown by a job into a storable exception.
 */
export function exception_serialize(error: unknown): JobException {
    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack ?? null,
        };
    }
    return {
        name: 'Error',
        message: String(error),
        stack: null,
    };
}

export class DefaultJobState implements JobState {
    constructor(private readonly record: JobRecord) {}

    get jobId(): string {
        return this.record.jobId;
    }

    status(): JobStatus {
        if (this.record.failedAt !== null) return 'failed';
        if (this.record.finishedAt !== null) return 'finished';
        if (this.record.startedAt !== null) return 'processing';
        if (this.record.gatedAt !== null) return 'gated';
        return 'pending';
    }

    isPending(): boolean {
        return this.status() === 'pending';
    }

    isGated(): boolean {
        return this.status() === 'gated';
    }

    isProcessing(): boolean {
        return this.status() === 'processing';
    }

    isFinished(): boolean {
        return this.status() === 'finished';
    }

    hasFailed(): boolean {
        return this.status() === 'failed';
    }

    dependencies_met(finishedIds: ReadonlySet<string>): boolean {
        return this.record.dependencies.every((id: string): boolean => finishedIds.has(id));
    }

    canRun(finishedIds: ReadonlySet<string>): boolean {
        return this.isPending() && !this.record.gated && this.dependencies_met(finishedIds);
    }

    transition(finishedIds: ReadonlySet<string>, now: Date): JobTransition {
        if (!this.isPending() || !this.dependencies_met(finishedIds)) return 'none';
        if (this.record.gated) {
            this.gated_mark(now);
            return 'gate';
        }
        return 'dispatch';
    }

    processing_mark(now: Date): void {
        const status = this.status();
        if (status !== 'pending' && status !== 'gated') {
            throw new InvalidStateTransitionError(this.record.jobId, status, 'start');
        }
        this.record.startedAt = now.toISOString();
        this.record.attempts += 1;
    }

    gated_mark(now: Date): void {
        const status = this.status();
        if (!this.record.gated) {
            throw new InvalidStateTransitionError(this.record.jobId, 'not gated', 'gate');
        }
        if (status !== 'pending') {
            throw new InvalidStateTransitionError(this.record.jobId, status, 'gate');
        }
        this.record.gatedAt = now.toISOString();
    }

    finished_mark(now: Date): void {
        const status = this.status();
        if (status !== 'processing') {
            throw new InvalidStateTransitionError(this.record.jobId, status, 'finish');
        }
        this.record.finishedAt = now.toISOString();
    }

    failed_mark(now: Date, error: unknown): void {
        const status = this.status();
        if (status !== 'processing') {
            throw new InvalidStateTransitionError(this.record.jobId, status, 'fail');
        }
        this.record.failedAt = now.toISOString();
        this.record.exception = exception_serialize(error);
    }

    retry_reset(): void {
        const status = this.status();
        if (status !== 'failed') {
            throw new InvalidStateTransitionError(this.record.jobId, status, 'retry');
        }
        this.record.failedAt = null;
        this.record.exception = null;
        this.record.startedAt = null;
        // A gated job was already released once; the retry goes straight out.
        this.record.gatedAt = null;
    }
}
