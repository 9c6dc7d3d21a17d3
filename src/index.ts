/**
 * @file Public API
 *
 * @module dagflow
 */

// ─── Graph ──────────────────────────────────────────────────────
export { JobGraph } from './dag/graph/JobGraph.js';
export { graph_validate, cycle_find } from './dag/graph/validator.js';
export type { JobNode, QueueRef, GraphEdge, ValidationResult } from './dag/graph/types.js';

// ─── Definitions ────────────────────────────────────────────────
export { WorkflowDefinition } from './dag/definition/WorkflowDefinition.js';
export type {
    JobOptions,
    NestedWorkflowOptions,
    DefinitionOptions,
    ThenCallback,
    CatchCallback,
} from './dag/definition/WorkflowDefinition.js';
export { ConditionalDependency, dependency_conditional } from './dag/definition/dependency.js';
export type { DependencyRef } from './dag/definition/dependency.js';
export { typeIdentity_default } from './dag/definition/identity.js';
export type { TypeIdentity } from './dag/definition/identity.js';
export { manifest_parse } from './dag/definition/parser/manifest.js';
export type { JobFactory, JobTypeRegistry } from './dag/definition/parser/manifest.js';

// ─── State ──────────────────────────────────────────────────────
export { DefaultJobState, exception_serialize } from './dag/state/JobState.js';
export { DefaultWorkflowState } from './dag/state/WorkflowState.js';
export { readiness_resolve, frontier_resolve, excluded_resolve } from './dag/state/resolver.js';
export type { JobReadiness } from './dag/state/resolver.js';
export type {
    JobStatus,
    JobTransition,
    JobState,
    WorkflowState,
    JobStateFactory,
    WorkflowStateFactory,
} from './dag/state/types.js';

// ─── Engine ─────────────────────────────────────────────────────
export { WorkflowEngine } from './dag/engine/WorkflowEngine.js';
export type { WorkflowEngineOptions } from './dag/engine/WorkflowEngine.js';
export { KeyedLock } from './dag/engine/lock.js';
export { InlineQueue } from './dag/engine/queue/InlineQueue.js';
export type { JobHandler, InlineQueueOptions } from './dag/engine/queue/InlineQueue.js';
export { RecordingQueue } from './dag/engine/queue/RecordingQueue.js';
export type {
    DispatchRequest,
    JobQueue,
    JobReporter,
    WorkflowStartResult,
    WorkflowStarter,
} from './dag/engine/types.js';

// ─── Events ─────────────────────────────────────────────────────
export { EventBus } from './dag/events/EventBus.js';
export { WorkflowEvents } from './dag/events/types.js';
export type {
    DefinitionInfo,
    JobDraft,
    JobAddingEvent,
    JobAddedEvent,
    WorkflowDraft,
    WorkflowAddingEvent,
    WorkflowAddedEvent,
    WorkflowCreatingEvent,
    JobCreatingEvent,
    WorkflowRecordEvent,
    WorkflowStartedEvent,
    JobRecordEvent,
    JobFailedEvent,
    EventPayloads,
    EventListener,
} from './dag/events/types.js';
export { EntityAwarePlugin, plugins_install } from './dag/events/plugins.js';
export type { WorkflowPlugin, PluginContext } from './dag/events/plugins.js';

// ─── Store ──────────────────────────────────────────────────────
export { WorkflowStore } from './dag/store/WorkflowStore.js';
export type { WorkflowStoreOptions } from './dag/store/WorkflowStore.js';
export { MemoryBackend } from './dag/store/backend/memory.js';
export { FsBackend } from './dag/store/backend/fs.js';
export type {
    StorageBackend,
    SubjectRef,
    JobException,
    WorkflowRecord,
    JobRecord,
    WorkflowRepository,
} from './dag/store/types.js';

// ─── Inspection ─────────────────────────────────────────────────
export { workflowProgress_resolve, jobsByStatus_list, excludedJobs_resolve } from './dag/inspect/progress.js';
export type { WorkflowProgress } from './dag/inspect/progress.js';
export { adjacencyList_build } from './dag/inspect/adjacency.js';
export type { AdjacencyEntry, AdjacencyList } from './dag/inspect/adjacency.js';
export { dot_render } from './dag/visualizer/dot.js';
export type { DotRenderOptions } from './dag/visualizer/dot.js';
export { tree_render, TREE_LEGEND } from './dag/visualizer/tree.js';

// ─── Testing ────────────────────────────────────────────────────
export { WorkflowFake } from './dag/testing/WorkflowFake.js';

// ─── Errors, settings, logging ──────────────────────────────────
export * from './dag/errors.js';
export { SettingsService, settings_resolve, SETTINGS_KEYS, LOG_LEVELS } from './config/settings.js';
export type { EngineSettings, SettingsKey, SettingSource, LogLevel } from './config/settings.js';
export { logger_create, logger_silent, MARKERS } from './logging/logger.js';
export type { Logger, LoggerOptions, LogSink } from './logging/logger.js';
