/**
 * @file Run State Type Definitions
 *
 * Per-job and per-workflow state for one run. State objects wrap the
 * record they govern and mutate it in place; the engine persists the
 * record afterwards. Both contracts are interfaces so a host can swap in
 * its own implementation through the factories.
 *
 * Job transitions:
 *
 *   pending --(deps finished, not gated)--> processing
 *   pending --(deps finished, gated)------> gated
 *   gated ---(manual start)---------------> processing
 *   processing --(success)----------------> finished
 *   processing --(throws)-----------------> failed
 *   failed ---(retry)---------------------> pending
 *
 * @module dag/state
 */

import type { JobRecord, WorkflowRecord } from '../store/types.js';

export type JobStatus = 'pending' | 'gated' | 'processing' | 'finished' | 'failed';

/**
 * Outcome of re-evaluating a job after a dependency finished.
 *
 * - `dispatch`: the job may run now; the caller dispatches it.
 * - `gate`: the job was gated and is now held for a manual start.
 * - `none`: nothing changed.
 */
export type JobTransition = 'dispatch' | 'gate' | 'none';

export interface JobState {
    readonly jobId: string;

    status(): JobStatus;
    isPending(): boolean;
    isGated(): boolean;
    isProcessing(): boolean;
    isFinished(): boolean;
    hasFailed(): boolean;

    /** Whether every direct dependency is in `finishedIds`. */
    dependencies_met(finishedIds: ReadonlySet<string>): boolean;

    /** pending, not gated, and all dependencies finished. */
    canRun(finishedIds: ReadonlySet<string>): boolean;

    /**
     * Re-evaluate after a dependency finished. Marks gated jobs as held;
     * safe to call any number of times.
     */
    transition(finishedIds: ReadonlySet<string>, now: Date): JobTransition;

    processing_mark(now: Date): void;
    gated_mark(now: Date): void;
    finished_mark(now: Date): void;
    failed_mark(now: Date, error: unknown): void;

    /** Put a failed job back to pending for a fresh dispatch. */
    retry_reset(): void;
}

export interface WorkflowState {
    readonly workflowId: string;

    /** jobsProcessed == jobCount */
    allJobsFinished(): boolean;

    /** jobsProcessed + jobsFailed == jobCount */
    hasRan(): boolean;

    /** finishedAt is set */
    isFinished(): boolean;

    isCancelled(): boolean;

    finishedJobs(): ReadonlySet<string>;

    jobFinished_record(jobId: string): void;
    jobFailed_record(jobId: string): void;

    /** Undo one recorded failure ahead of a retry. */
    jobFailure_clear(jobId: string): void;

    /** Set finishedAt. Returns false if it was already set. */
    finished_mark(now: Date): boolean;

    /** Set cancelledAt. Returns false if it was already set. */
    cancel(now: Date): boolean;
}

export type JobStateFactory = (record: JobRecord) => JobState;
export type WorkflowStateFactory = (record: WorkflowRecord) => WorkflowState;
