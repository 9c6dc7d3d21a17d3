/**
 * @file DAG Store Type Definitions
 *
 * Types for the storage layer that records workflow runs. The store keeps
 * one record per workflow and one per job, both plain JSON. It is
 * backend-agnostic: the same interface works against memory or the real
 * filesystem.
 *
 * @module dag/store
 */

// ─── Storage Backend Interface ──────────────────────────────────

/**
 * Backend-agnostic storage interface.
 *
 * The workflow store never touches I/O directly. All reads and writes go
 * through this interface. Methods follow the project's subject_verb
 * naming.
 */
export interface StorageBackend {
    /** Write data to a path. Creates parent directories as needed. */
    record_write(path: string, data: string): Promise<void>;

    /** Read data from a path. Returns null if path doesn't exist. */
    record_read(path: string): Promise<string | null>;

    /** Check whether a path exists. */
    path_exists(path: string): Promise<boolean>;

    /** List immediate children of a path. Returns names, not full paths. */
    children_list(path: string): Promise<string[]>;

    /** Create a directory (and parents). No-op if already exists. */
    dir_create(path: string): Promise<void>;

    /** Remove a path and everything below it. No-op if absent. */
    path_remove(path: string): Promise<void>;
}

// ─── Records ────────────────────────────────────────────────────

/**
 * The entity a workflow is about (an order, an upload, a user...).
 */
export interface SubjectRef {
    type: string;
    id: string;
}

/**
 * Serialized failure of a job.
 */
export interface JobException {
    name: string;
    message: string;
    stack: string | null;
}

/**
 * Persisted state of one workflow run.
 *
 * @property jobCount - Number of jobs in the graph
 * @property jobsProcessed - Jobs that finished successfully
 * @property jobsFailed - Jobs whose last attempt failed
 * @property finishedJobIds - Ids of finished jobs, in completion order
 * @property finishedAt - Set once, when every job has finished
 * @property cancelledAt - Set at most once
 * @property subject - Entity the workflow belongs to, if any
 */
export interface WorkflowRecord {
    id: string;
    name: string;
    jobCount: number;
    jobsProcessed: number;
    jobsFailed: number;
    finishedJobIds: string[];
    createdAt: string;
    finishedAt: string | null;
    cancelledAt: string | null;
    subject: SubjectRef | null;
}

/**
 * Persisted state of one job within a workflow run.
 *
 * Status is derived from the timestamps (see dag/state).
 *
 * @property sequence - Insertion position within the graph
 * @property payloadType - Type identity of the payload, for display
 * @property dependencies - Direct dependency ids (the graph's edges)
 * @property attempts - How many times the job has been dispatched
 */
export interface JobRecord {
    workflowId: string;
    jobId: string;
    sequence: number;
    name: string;
    payloadType: string;
    dependencies: string[];
    delay: number | null;
    queue: string | null;
    connection: string | null;
    gated: boolean;
    createdAt: string;
    startedAt: string | null;
    gatedAt: string | null;
    finishedAt: string | null;
    failedAt: string | null;
    exception: JobException | null;
    attempts: number;
}

// ─── Repository Interface ───────────────────────────────────────

/**
 * Persistence collaborator consumed by the engine.
 *
 * Reads must observe every completed write (read-back consistency).
 */
export interface WorkflowRepository {
    workflow_save(record: WorkflowRecord): Promise<void>;

    /** Returns null if no workflow has this id. */
    workflow_load(workflowId: string): Promise<WorkflowRecord | null>;

    /** All workflows, newest first. */
    workflows_list(): Promise<WorkflowRecord[]>;

    /** Workflows whose subject matches, newest first. */
    workflowsForSubject_list(subject: SubjectRef): Promise<WorkflowRecord[]>;

    /** Remove a workflow and all its jobs. */
    workflow_delete(workflowId: string): Promise<void>;

    job_save(record: JobRecord): Promise<void>;

    /** Returns null if the job is unknown. */
    job_load(workflowId: string, jobId: string): Promise<JobRecord | null>;

    /** Jobs of a workflow in graph insertion order. */
    jobs_list(workflowId: string): Promise<JobRecord[]>;
}
