/**
 * @file Recording Queue
 *
 * Keeps every dispatch request and runs nothing. Tests drive completions
 * by calling the engine directly.
 *
 * @module dag/engine/queue
 */

import type { DispatchRequest, JobQueue } from '../types.js';

export class RecordingQueue<P> implements JobQueue<P> {
    readonly requests: DispatchRequest<P>[] = [];

    dispatch(request: DispatchRequest<P>): void {
        this.requests.push(request);
    }

    /** Dispatched job ids in dispatch order, optionally for one workflow. */
    jobIds_list(workflowId?: string): string[] {
        return this.requests
            .filter((request: DispatchRequest<P>): boolean => workflowId === undefined || request.workflowId === workflowId)
            .map((request: DispatchRequest<P>): string => request.jobId);
    }

    clear(): void {
        this.requests.length = 0;
    }
}
