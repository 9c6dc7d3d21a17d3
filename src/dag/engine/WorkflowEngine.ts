/**
 * @file Workflow Engine
 *
 * Persists workflow runs, dispatches jobs whose dependencies have
 * finished, and propagates completion and failure through the graph.
 *
 * Every operation that touches one workflow's bookkeeping runs under a
 * per-workflow lock, so concurrent completions from different workers
 * are applied one at a time and a shared dependent is dispatched at
 * most once.
 *
 * The sealed graph and the then/catch callbacks of each run stay in
 * memory until the run finishes (or `workflow_forget` drops them);
 * records go to the repository.
 *
 * User callbacks run after an operation has advanced every job it
 * touches. A throwing callback never leaves part of a frontier
 * undispatched; its error is rethrown once the bookkeeping is done.
 *
 * @module dag/engine
 */

import { v4 as uuidv4 } from 'uuid';
import type { EngineSettings } from '../../config/settings.js';
import type { Logger } from '../../logging/logger.js';
import type { JobGraph } from '../graph/JobGraph.js';
import type { JobNode } from '../graph/types.js';
import type { JobRecord, WorkflowRecord, WorkflowRepository } from '../store/types.js';
import type { JobState, JobStateFactory, WorkflowState, WorkflowStateFactory } from '../state/types.js';
import type { WorkflowPlugin } from '../events/plugins.js';
import type {
    CatchCallback,
    DefinitionOptions,
    ThenCallback,
} from '../definition/WorkflowDefinition.js';
import type {
    DispatchRequest,
    JobQueue,
    JobReporter,
    WorkflowStartResult,
    WorkflowStarter,
} from './types.js';
import { settings_resolve } from '../../config/settings.js';
import { logger_create } from '../../logging/logger.js';
import { WorkflowDefinition } from '../definition/WorkflowDefinition.js';
import { EventBus } from '../events/EventBus.js';
import { WorkflowEvents } from '../events/types.js';
import { plugins_install } from '../events/plugins.js';
import { DefaultJobState } from '../state/JobState.js';
import { DefaultWorkflowState } from '../state/WorkflowState.js';
import { WorkflowStore } from '../store/WorkflowStore.js';
import { MemoryBackend } from '../store/backend/memory.js';
import { KeyedLock } from './lock.js';
import {
    InvalidStateTransitionError,
    JobNotFoundError,
    WorkflowNotFoundError,
} from '../errors.js';

export interface WorkflowEngineOptions<P> {
    queue: JobQueue<P>;
    /** Defaults to a WorkflowStore over a MemoryBackend. */
    repository?: WorkflowRepository;
    events?: EventBus;
    settings?: EngineSettings;
    plugins?: readonly WorkflowPlugin[];
    logger?: Logger;
    clock?: () => Date;
    /** Workflow id generator; uuid v4 by default. */
    ids?: () => string;
    jobStateFactory?: JobStateFactory;
    workflowStateFactory?: WorkflowStateFactory;
}

/** In-memory part of a run. */
interface RunContext<P> {
    graph: JobGraph<P>;
    thenCallbacks: readonly ThenCallback[];
    catchCallbacks: readonly CatchCallback[];
}

/** A then/catch callback call held back until the operation's bookkeeping is done. */
type Notice = () => void | Promise<void>;

function record_snapshot<T>(record: T): T {
    return structuredClone(record);
}

export class WorkflowEngine<P = unknown> implements WorkflowStarter<P>, JobReporter {
    readonly events: EventBus;
    readonly settings: Readonly<EngineSettings>;

    private readonly queue: JobQueue<P>;
    private readonly repository: WorkflowRepository;
    private readonly logger: Logger;
    private readonly clock: () => Date;
    private readonly ids: () => string;
    private readonly jobState: JobStateFactory;
    private readonly workflowState: WorkflowStateFactory;
    private readonly lock = new KeyedLock();
    private readonly runs = new Map<string, RunContext<P>>();

    constructor(options: WorkflowEngineOptions<P>) {
        this.settings = options.settings ?? settings_resolve();
        this.events = options.events ?? new EventBus();
        this.queue = options.queue;
        this.repository = options.repository ?? new WorkflowStore(new MemoryBackend(), {
            basePath: this.settings.storePath,
            workflowsTable: this.settings.workflowsTable,
            jobsTable: this.settings.jobsTable,
        });
        this.logger = options.logger ?? logger_create('engine', { level: this.settings.logLevel });
        this.clock = options.clock ?? ((): Date => new Date());
        this.ids = options.ids ?? ((): string => uuidv4());
        this.jobState = options.jobStateFactory ?? ((record: JobRecord): JobState => new DefaultJobState(record));
        this.workflowState = options.workflowStateFactory ?? ((record: WorkflowRecord): WorkflowState => new DefaultWorkflowState(record));

        plugins_install(this.events, options.plugins ?? [], this.settings, this.logger.child('plugin'));
        this.queue.reporter_attach?.(this);
    }

    /**
     * New definition wired to this engine's bus and clock.
     */
    definition_create(name: string, options: Omit<DefinitionOptions, 'events' | 'clock'> = {}): WorkflowDefinition<P> {
        return new WorkflowDefinition<P>(name, { ...options, events: this.events, clock: this.clock });
    }

    // ─── Start ──────────────────────────────────────────────────

    /**
     * Seal the definition, persist the run and dispatch its roots.
     *
     * Definition errors (unresolvable dependency, duplicate id, cycle)
     * surface here before anything is persisted.
     */
    async workflow_start(definition: WorkflowDefinition<P>): Promise<WorkflowStartResult> {
        const graph = definition.graph_build();
        const now = this.clock();

        const workflow: WorkflowRecord = {
            id: this.ids(),
            name: definition.name,
            jobCount: graph.size,
            jobsProcessed: 0,
            jobsFailed: 0,
            finishedJobIds: [],
            createdAt: now.toISOString(),
            finishedAt: null,
            cancelledAt: null,
            subject: null,
        };
        this.events.emit(WorkflowEvents.WORKFLOW_CREATING, { definition: definition.info(), record: workflow });

        const jobs = new Map<string, JobRecord>();
        graph.nodes_list().forEach((node: Readonly<JobNode<P>>, sequence: number): void => {
            const job = this.jobRecord_create(workflow, node, sequence, now);
            this.events.emit(WorkflowEvents.JOB_CREATING, { workflow: record_snapshot(workflow), record: job });
            jobs.set(node.id, job);
        });

        const run: RunContext<P> = {
            graph,
            thenCallbacks: definition.thenCallbacks_list(),
            catchCallbacks: definition.catchCallbacks_list(),
        };

        return this.lock.run(workflow.id, async (): Promise<WorkflowStartResult> => {
            const notices: Notice[] = [];
            await this.repository.workflow_save(workflow);
            this.runs.set(workflow.id, run);
            this.events.emit(WorkflowEvents.WORKFLOW_CREATED, { workflow: record_snapshot(workflow) });

            for (const job of jobs.values()) {
                await this.repository.job_save(job);
                this.events.emit(WorkflowEvents.JOB_CREATED, { workflow: record_snapshot(workflow), job: record_snapshot(job) });
            }

            const frontier = graph.roots_list();
            const dispatched: string[] = [];
            const gated: string[] = [];
            const finishedIds = this.workflowState(workflow).finishedJobs();
            for (const jobId of frontier) {
                const job = jobs.get(jobId);
                if (!job) throw new JobNotFoundError(workflow.id, jobId);
                const outcome = await this.job_advance(run, workflow, job, finishedIds, notices);
                if (outcome === 'dispatch') dispatched.push(jobId);
                if (outcome === 'gate') gated.push(jobId);
            }

            this.logger.info(`workflow '${workflow.name}' (${workflow.id}) started: ${graph.size} job(s), ${dispatched.length} dispatched`);
            this.events.emit(WorkflowEvents.WORKFLOW_STARTED, {
                workflow: record_snapshot(workflow),
                frontier: [...frontier],
                dispatched: [...dispatched],
            });

            if (graph.size === 0) {
                await this.workflow_complete(run, workflow, notices);
            }

            const result: WorkflowStartResult = { workflow: record_snapshot(workflow), frontier, dispatched, gated };
            await this.notices_flush(workflow.id, notices);
            return result;
        });
    }

    // ─── Reporting ──────────────────────────────────────────────

    /**
     * Record a successful job and dispatch whatever became runnable.
     *
     * @returns Ids of the jobs dispatched as a result
     */
    job_finished(workflowId: string, jobId: string): Promise<string[]> {
        return this.lock.run(workflowId, async (): Promise<string[]> => {
            const { run, workflow } = await this.run_load(workflowId);
            const job = await this.job_require(workflowId, jobId);
            const now = this.clock();
            const workflowState = this.workflowState(workflow);

            this.jobState(job).finished_mark(now);
            workflowState.jobFinished_record(jobId);
            await this.repository.job_save(job);
            await this.repository.workflow_save(workflow);
            this.events.emit(WorkflowEvents.JOB_FINISHED, { workflow: record_snapshot(workflow), job: record_snapshot(job) });

            if (workflowState.isCancelled()) {
                this.logger.debug(`${workflowId}: '${jobId}' finished after cancellation; nothing dispatched`);
                return [];
            }

            const notices: Notice[] = [];
            const dispatched: string[] = [];
            const finishedIds = workflowState.finishedJobs();
            for (const dependentId of run.graph.dependents_list(jobId)) {
                const dependent = await this.job_require(workflowId, dependentId);
                if (await this.job_advance(run, workflow, dependent, finishedIds, notices) === 'dispatch') {
                    dispatched.push(dependentId);
                }
            }

            if (workflowState.allJobsFinished()) {
                await this.workflow_complete(run, workflow, notices);
            }
            await this.notices_flush(workflowId, notices);
            return dispatched;
        });
    }

    /**
     * Record a failed job. Its descendants are never dispatched in this
     * run; unrelated branches carry on. Each failure calls the catch
     * callbacks once.
     */
    job_failed(workflowId: string, jobId: string, error: unknown): Promise<void> {
        return this.lock.run(workflowId, async (): Promise<void> => {
            const { run, workflow } = await this.run_load(workflowId);
            const job = await this.job_require(workflowId, jobId);
            const notices: Notice[] = [];
            await this.failure_record(run, workflow, job, error, notices);
            await this.notices_flush(workflowId, notices);
        });
    }

    // ─── Administrative actions ─────────────────────────────────

    /**
     * Stop all further dispatch. Jobs already handed to the queue still
     * report in. Repeated calls leave `cancelledAt` untouched.
     */
    workflow_cancel(workflowId: string): Promise<WorkflowRecord> {
        return this.lock.run(workflowId, async (): Promise<WorkflowRecord> => {
            const workflow = await this.workflow_require(workflowId);
            if (this.workflowState(workflow).cancel(this.clock())) {
                await this.repository.workflow_save(workflow);
                this.logger.info(`workflow '${workflow.name}' (${workflowId}) cancelled`);
                this.events.emit(WorkflowEvents.WORKFLOW_CANCELLED, { workflow: record_snapshot(workflow) });
            }
            return record_snapshot(workflow);
        });
    }

    /**
     * Release a gated job.
     *
     * @throws InvalidStateTransitionError unless the job is gated and the
     *   workflow is not cancelled
     */
    gatedJob_start(workflowId: string, jobId: string): Promise<void> {
        return this.lock.run(workflowId, async (): Promise<void> => {
            const { run, workflow } = await this.run_load(workflowId);
            const job = await this.job_require(workflowId, jobId);
            const state = this.jobState(job);
            if (!state.isGated()) {
                throw new InvalidStateTransitionError(jobId, state.status(), 'start');
            }
            this.cancelled_refuse(workflow, 'start a gated job in');
            const notices: Notice[] = [];
            await this.job_dispatch(run, workflow, job, notices);
            await this.notices_flush(workflowId, notices);
        });
    }

    /**
     * Put a failed job back on the queue as a fresh dispatch.
     *
     * @throws InvalidStateTransitionError unless the job has failed and
     *   the workflow is not cancelled
     */
    job_retry(workflowId: string, jobId: string): Promise<void> {
        return this.lock.run(workflowId, async (): Promise<void> => {
            const { run, workflow } = await this.run_load(workflowId);
            const job = await this.job_require(workflowId, jobId);
            this.cancelled_refuse(workflow, 'retry a job in');

            this.jobState(job).retry_reset();
            this.workflowState(workflow).jobFailure_clear(jobId);
            await this.repository.workflow_save(workflow);
            this.logger.info(`${workflowId}: retrying '${jobId}'`);
            const notices: Notice[] = [];
            await this.job_dispatch(run, workflow, job, notices);
            await this.notices_flush(workflowId, notices);
        });
    }

    // ─── Read side ──────────────────────────────────────────────

    async workflow_get(workflowId: string): Promise<WorkflowRecord> {
        return this.workflow_require(workflowId);
    }

    async jobs_list(workflowId: string): Promise<JobRecord[]> {
        await this.workflow_require(workflowId);
        return this.repository.jobs_list(workflowId);
    }

    /** The sealed graph of a live run started by this engine. */
    graph_get(workflowId: string): JobGraph<P> | null {
        return this.runs.get(workflowId)?.graph ?? null;
    }

    /**
     * Drop the in-memory part of a run (graph and callbacks). Finished
     * runs are dropped automatically; failed or cancelled runs stay until
     * forgotten. Records in the repository are untouched, and later
     * reports for the run throw WorkflowNotFoundError.
     *
     * @returns Whether the engine was holding the run
     */
    workflow_forget(workflowId: string): boolean {
        return this.runs.delete(workflowId);
    }

    // ─── Internals ──────────────────────────────────────────────

    private jobRecord_create(workflow: WorkflowRecord, node: Readonly<JobNode<P>>, sequence: number, now: Date): JobRecord {
        return {
            workflowId: workflow.id,
            jobId: node.id,
            sequence,
            name: node.name,
            payloadType: node.type,
            dependencies: [...node.dependencies],
            delay: node.delay,
            queue: node.queue.queue,
            connection: node.queue.connection,
            gated: node.gated,
            createdAt: now.toISOString(),
            startedAt: null,
            gatedAt: null,
            finishedAt: null,
            failedAt: null,
            exception: null,
            attempts: 0,
        };
    }

    /**
     * Re-evaluate one job: dispatch it, gate it, or leave it.
     */
    private async job_advance(
        run: RunContext<P>,
        workflow: WorkflowRecord,
        job: JobRecord,
        finishedIds: ReadonlySet<string>,
        notices: Notice[],
    ): Promise<'dispatch' | 'gate' | 'none'> {
        const outcome = this.jobState(job).transition(finishedIds, this.clock());
        if (outcome === 'gate') {
            await this.repository.job_save(job);
            this.logger.debug(`${workflow.id}: '${job.jobId}' is gated`);
            this.events.emit(WorkflowEvents.JOB_GATED, { workflow: record_snapshot(workflow), job: record_snapshot(job) });
            return 'gate';
        }
        if (outcome === 'dispatch') {
            return (await this.job_dispatch(run, workflow, job, notices)) ? 'dispatch' : 'none';
        }
        return 'none';
    }

    /**
     * Mark processing, persist, and hand the job to the queue. A queue
     * that refuses the job turns into a job failure.
     *
     * @returns Whether the queue accepted the job
     */
    private async job_dispatch(run: RunContext<P>, workflow: WorkflowRecord, job: JobRecord, notices: Notice[]): Promise<boolean> {
        const node = run.graph.node_get(job.jobId);
        if (!node) throw new JobNotFoundError(workflow.id, job.jobId);

        this.jobState(job).processing_mark(this.clock());
        await this.repository.job_save(job);
        this.events.emit(WorkflowEvents.JOB_PROCESSING, { workflow: record_snapshot(workflow), job: record_snapshot(job) });

        const request: DispatchRequest<P> = {
            workflowId: workflow.id,
            jobId: job.jobId,
            name: job.name,
            payload: node.payload,
            queue: job.queue ?? this.settings.queue,
            connection: job.connection ?? this.settings.connection,
            delay: job.delay,
            attempt: job.attempts,
        };
        this.logger.debug(`${workflow.id}: dispatch '${job.jobId}' to ${request.connection}/${request.queue}`);

        try {
            await this.queue.dispatch(request);
        } catch (e: unknown) {
            this.logger.error(`${workflow.id}: queue rejected '${job.jobId}': ${e instanceof Error ? e.message : String(e)}`);
            await this.failure_record(run, workflow, job, e, notices);
            return false;
        }
        return true;
    }

    private async failure_record(
        run: RunContext<P>,
        workflow: WorkflowRecord,
        job: JobRecord,
        error: unknown,
        notices: Notice[],
    ): Promise<void> {
        this.jobState(job).failed_mark(this.clock(), error);
        this.workflowState(workflow).jobFailed_record(job.jobId);
        await this.repository.job_save(job);
        await this.repository.workflow_save(workflow);

        const excluded = run.graph.descendants_resolve(job.jobId).size;
        this.logger.warn(`workflow '${workflow.name}' (${workflow.id}): job '${job.jobId}' failed` +
            (excluded > 0 ? `, ${excluded} dependent job(s) will not run` : ''));
        this.events.emit(WorkflowEvents.JOB_FAILED, {
            workflow: record_snapshot(workflow),
            job: record_snapshot(job),
            error,
        });

        const workflowSnapshot = record_snapshot(workflow);
        const jobSnapshot = record_snapshot(job);
        for (const callback of run.catchCallbacks) {
            notices.push((): void | Promise<void> => callback(record_snapshot(workflowSnapshot), record_snapshot(jobSnapshot), error));
        }
    }

    private async workflow_complete(run: RunContext<P>, workflow: WorkflowRecord, notices: Notice[]): Promise<void> {
        if (!this.workflowState(workflow).finished_mark(this.clock())) return;
        await this.repository.workflow_save(workflow);
        this.runs.delete(workflow.id);
        this.logger.info(`workflow '${workflow.name}' (${workflow.id}) finished`);
        this.events.emit(WorkflowEvents.WORKFLOW_FINISHED, { workflow: record_snapshot(workflow) });

        const snapshot = record_snapshot(workflow);
        for (const callback of run.thenCallbacks) {
            notices.push((): void | Promise<void> => callback(record_snapshot(snapshot)));
        }
    }

    /**
     * Run held-back callbacks in order. Every callback runs; the first
     * error is rethrown after the last one.
     */
    private async notices_flush(workflowId: string, notices: readonly Notice[]): Promise<void> {
        const errors: unknown[] = [];
        for (const notice of notices) {
            try {
                await notice();
            } catch (e: unknown) {
                this.logger.error(`${workflowId}: callback failed: ${e instanceof Error ? e.message : String(e)}`);
                errors.push(e);
            }
        }
        if (errors.length > 0) throw errors[0];
    }

    private cancelled_refuse(workflow: WorkflowRecord, action: string): void {
        if (this.workflowState(workflow).isCancelled()) {
            throw new InvalidStateTransitionError(workflow.id, 'cancelled', action);
        }
    }

    private async workflow_require(workflowId: string): Promise<WorkflowRecord> {
        const workflow = await this.repository.workflow_load(workflowId);
        if (!workflow) throw new WorkflowNotFoundError(workflowId);
        return workflow;
    }

    private async run_load(workflowId: string): Promise<{ run: RunContext<P>; workflow: WorkflowRecord }> {
        const run = this.runs.get(workflowId);
        if (!run) throw new WorkflowNotFoundError(workflowId);
        return { run, workflow: await this.workflow_require(workflowId) };
    }

    private async job_require(workflowId: string, jobId: string): Promise<JobRecord> {
        const job = await this.repository.job_load(workflowId, jobId);
        if (!job) throw new JobNotFoundError(workflowId, jobId);
        return job;
    }
}
