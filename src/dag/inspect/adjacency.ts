/**
 * @file Adjacency List
 *
 * Serializable view of a run for front ends: one entry per job with its
 * status and the jobs that depend on it.
 *
 * @module dag/inspect
 */

import type { JobRecord } from '../store/types.js';
import type { JobStateFactory, JobStatus } from '../state/types.js';
import { DefaultJobState } from '../state/JobState.js';

export interface AdjacencyEntry {
    name: string;
    status: JobStatus;
    /** Ids of direct dependents, in sequence order. */
    edges: string[];
}

export type AdjacencyList = Record<string, AdjacencyEntry>;

export function adjacencyList_build(jobs: readonly JobRecord[], jobStateFactory?: JobStateFactory): AdjacencyList {
    const create: JobStateFactory = jobStateFactory ?? ((record: JobRecord): DefaultJobState => new DefaultJobState(record));
    const ordered = [...jobs].sort((a: JobRecord, b: JobRecord): number => a.sequence - b.sequence);

    const list: AdjacencyList = {};
    for (const job of ordered) {
        list[job.jobId] = { name: job.name, status: create(job).status(), edges: [] };
    }
    for (const job of ordered) {
        for (const dependency of job.dependencies) {
            list[dependency]?.edges.push(job.jobId);
        }
    }
    return list;
}
