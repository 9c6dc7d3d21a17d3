/**
 * @file Workflow Event Types
 *
 * Lifecycle notifications published by the definition builder and the
 * engine. Events ending in -ing fire before the change is committed and
 * carry a mutable draft; listeners may edit the draft or throw to abort.
 * All other events report a change that already happened.
 *
 * @module dag/events
 */

import type { JobNode } from '../graph/types.js';
import type { JobRecord, SubjectRef, WorkflowRecord } from '../store/types.js';

/** All lifecycle event types. */
export enum WorkflowEvents {
    JOB_ADDING = 'JobAdding',
    JOB_ADDED = 'JobAdded',
    JOB_CREATING = 'JobCreating',
    JOB_CREATED = 'JobCreated',
    JOB_PROCESSING = 'JobProcessing',
    JOB_GATED = 'JobGated',
    JOB_FINISHED = 'JobFinished',
    JOB_FAILED = 'JobFailed',
    WORKFLOW_ADDING = 'WorkflowAdding',
    WORKFLOW_ADDED = 'WorkflowAdded',
    WORKFLOW_CREATING = 'WorkflowCreating',
    WORKFLOW_CREATED = 'WorkflowCreated',
    WORKFLOW_STARTED = 'WorkflowStarted',
    WORKFLOW_FINISHED = 'WorkflowFinished',
    WORKFLOW_CANCELLED = 'WorkflowCancelled',
}

/**
 * What listeners may know about the definition that produced an event.
 */
export interface DefinitionInfo {
    name: string;
    subject: SubjectRef | null;
}

/** Mutable part of a job about to be added. */
export interface JobDraft {
    id: string;
    name: string;
    delay: number | null;
}

export interface JobAddingEvent {
    definition: DefinitionInfo;
    payload: unknown;
    dependencies: readonly string[];
    draft: JobDraft;
}

export interface JobAddedEvent {
    definition: DefinitionInfo;
    node: Readonly<JobNode<unknown>>;
}

/** Mutable part of a nested workflow about to be added. */
export interface WorkflowDraft {
    id: string;
}

export interface WorkflowAddingEvent {
    definition: DefinitionInfo;
    child: DefinitionInfo;
    dependencies: readonly string[];
    draft: WorkflowDraft;
}

export interface WorkflowAddedEvent {
    definition: DefinitionInfo;
    id: string;
    jobIds: string[];
}

export interface WorkflowCreatingEvent {
    definition: DefinitionInfo;
    record: WorkflowRecord;
}

export interface JobCreatingEvent {
    workflow: Readonly<WorkflowRecord>;
    record: JobRecord;
}

export interface WorkflowRecordEvent {
    workflow: Readonly<WorkflowRecord>;
}

export interface WorkflowStartedEvent {
    workflow: Readonly<WorkflowRecord>;
    frontier: string[];
    dispatched: string[];
}

export interface JobRecordEvent {
    workflow: Readonly<WorkflowRecord>;
    job: Readonly<JobRecord>;
}

export interface JobFailedEvent extends JobRecordEvent {
    error: unknown;
}

/** Maps each event type to its payload type. */
export interface EventPayloads {
    [WorkflowEvents.JOB_ADDING]: JobAddingEvent;
    [WorkflowEvents.JOB_ADDED]: JobAddedEvent;
    [WorkflowEvents.JOB_CREATING]: JobCreatingEvent;
    [WorkflowEvents.JOB_CREATED]: JobRecordEvent;
    [WorkflowEvents.JOB_PROCESSING]: JobRecordEvent;
    [WorkflowEvents.JOB_GATED]: JobRecordEvent;
    [WorkflowEvents.JOB_FINISHED]: JobRecordEvent;
    [WorkflowEvents.JOB_FAILED]: JobFailedEvent;
    [WorkflowEvents.WORKFLOW_ADDING]: WorkflowAddingEvent;
    [WorkflowEvents.WORKFLOW_ADDED]: WorkflowAddedEvent;
    [WorkflowEvents.WORKFLOW_CREATING]: WorkflowCreatingEvent;
    [WorkflowEvents.WORKFLOW_CREATED]: WorkflowRecordEvent;
    [WorkflowEvents.WORKFLOW_STARTED]: WorkflowStartedEvent;
    [WorkflowEvents.WORKFLOW_FINISHED]: WorkflowRecordEvent;
    [WorkflowEvents.WORKFLOW_CANCELLED]: WorkflowRecordEvent;
}

export type EventListener<K extends WorkflowEvents> = (payload: EventPayloads[K]) => void;
