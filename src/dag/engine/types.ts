/**
 * @file Engine Type Definitions
 *
 * The boundary between the engine and the execution substrate. The
 * engine hands a DispatchRequest to a JobQueue; whatever runs the job
 * reports back through a JobReporter (in practice the engine itself).
 *
 * @module dag/engine
 */

import type { WorkflowDefinition } from '../definition/WorkflowDefinition.js';
import type { WorkflowRecord } from '../store/types.js';

/**
 * One job handed to the queue.
 *
 * @property queue - Resolved queue name (job, definition, then engine default)
 * @property delay - Milliseconds to hold the job before running it
 * @property attempt - 1 on first dispatch, incremented by each retry
 */
export interface DispatchRequest<P> {
    workflowId: string;
    jobId: string;
    name: string;
    payload: P;
    queue: string;
    connection: string;
    delay: number | null;
    attempt: number;
}

/** Where executors report outcomes. */
export interface JobReporter {
    /** @returns Ids of jobs dispatched as a result */
    job_finished(workflowId: string, jobId: string): Promise<string[]>;
    job_failed(workflowId: string, jobId: string, error: unknown): Promise<void>;
}

/**
 * External queue the engine dispatches into. A queue that runs jobs
 * itself implements `reporter_attach` and is handed the engine on
 * construction.
 */
export interface JobQueue<P> {
    dispatch(request: DispatchRequest<P>): void | Promise<void>;
    reporter_attach?(reporter: JobReporter): void;
}

/**
 * Result of starting a workflow.
 *
 * @property frontier - Root job ids, i.e. the initial runnable set
 * @property dispatched - Roots handed to the queue, in insertion order
 * @property gated - Roots held for a manual start
 */
export interface WorkflowStartResult {
    workflow: WorkflowRecord;
    frontier: string[];
    dispatched: string[];
    gated: string[];
}

/** Anything that can start a definition: the engine, or a fake. */
export interface WorkflowStarter<P> {
    workflow_start(definition: WorkflowDefinition<P>): Promise<WorkflowStartResult>;
}
