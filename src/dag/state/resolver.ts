/**
 * @file Frontier Resolver
 *
 * Resolves per-job readiness and the runnable frontier from a graph, the
 * set of finished job ids, and each job's current status. Computed fresh
 * on every query, never cached.
 *
 * @module dag/state
 */

import type { JobGraph } from '../graph/JobGraph.js';
import type { JobStatus } from './types.js';

/**
 * Readiness of a single job.
 *
 * @property jobId - Job id
 * @property status - Current run status
 * @property ready - All dependencies finished
 * @property runnable - Ready, pending and not gated: the dispatch predicate
 * @property pendingDependencies - Dependencies that have not finished
 */
export interface JobReadiness {
    jobId: string;
    status: JobStatus;
    ready: boolean;
    runnable: boolean;
    pendingDependencies: string[];
}

/**
 * Resolve readiness for every job, in insertion order.
 *
 * @param graph - The workflow graph
 * @param finishedIds - Ids of finished jobs
 * @param statusOf - Current status of a job
 */
export function readiness_resolve<P>(
    graph: JobGraph<P>,
    finishedIds: ReadonlySet<string>,
    statusOf: (jobId: string) => JobStatus,
): JobReadiness[] {
    return graph.nodes_list().map((node): JobReadiness => {
        const pendingDependencies = node.dependencies.filter((id: string): boolean => !finishedIds.has(id));
        const status = statusOf(node.id);
        const ready = pendingDependencies.length === 0;
        return {
            jobId: node.id,
            status,
            ready,
            runnable: ready && status === 'pending' && !node.gated,
            pendingDependencies,
        };
    });
}

/**
 * The runnable frontier: jobs that may be dispatched right now.
 */
export function frontier_resolve<P>(
    graph: JobGraph<P>,
    finishedIds: ReadonlySet<string>,
    statusOf: (jobId: string) => JobStatus,
): string[] {
    return readiness_resolve(graph, finishedIds, statusOf)
        .filter((r: JobReadiness): boolean => r.runnable)
        .map((r: JobReadiness): string => r.jobId);
}

/**
 * Jobs that can never run in this run because something they depend on,
 * directly or transitively, has failed.
 */
export function excluded_resolve<P>(
    graph: JobGraph<P>,
    statusOf: (jobId: string) => JobStatus,
): Set<string> {
    const excluded = new Set<string>();
    for (const node of graph.nodes_list()) {
        if (statusOf(node.id) !== 'failed') continue;
        for (const id of graph.descendants_resolve(node.id)) {
            excluded.add(id);
        }
    }
    return excluded;
}
