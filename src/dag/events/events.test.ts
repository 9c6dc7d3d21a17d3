/**
 * @file Event Bus and Plugin Tests
 *
 * @module dag/events
 */

import { describe, it, expect, vi } from 'vitest';
import { EventBus } from './EventBus.js';
import { WorkflowEvents } from './types.js';
import type { WorkflowCreatingEvent, WorkflowRecordEvent } from './types.js';
import { EntityAwarePlugin, plugins_install } from './plugins.js';
import type { PluginContext, WorkflowPlugin } from './plugins.js';
import type { WorkflowRecord } from '../store/types.js';
import { settings_resolve } from '../../config/settings.js';
import { logger_silent } from '../../logging/logger.js';

function record_make(): WorkflowRecord {
    return {
        id: 'wf-1',
        name: 'orders',
        jobCount: 0,
        jobsProcessed: 0,
        jobsFailed: 0,
        finishedJobIds: [],
        createdAt: '2026-01-01T00:00:00.000Z',
        finishedAt: null,
        cancelledAt: null,
        subject: null,
    };
}

describe('dag/events/EventBus', (): void => {
    it('should call listeners in registration order', (): void => {
        const bus = new EventBus();
        const calls: string[] = [];
        bus.on(WorkflowEvents.WORKFLOW_FINISHED, (): void => { calls.push('first'); });
        bus.on(WorkflowEvents.WORKFLOW_FINISHED, (): void => { calls.push('second'); });

        bus.emit(WorkflowEvents.WORKFLOW_FINISHED, { workflow: record_make() });
        expect(calls).toEqual(['first', 'second']);
    });

    it('should stop calling a listener once unsubscribed', (): void => {
        const bus = new EventBus();
        const listener = vi.fn();
        const unsubscribe = bus.on(WorkflowEvents.WORKFLOW_CREATED, listener);

        bus.emit(WorkflowEvents.WORKFLOW_CREATED, { workflow: record_make() });
        unsubscribe();
        bus.emit(WorkflowEvents.WORKFLOW_CREATED, { workflow: record_make() });

        expect(listener).toHaveBeenCalledTimes(1);
        expect(bus.listenerCount(WorkflowEvents.WORKFLOW_CREATED)).toBe(0);
    });

    it('should call once-listeners a single time', (): void => {
        const bus = new EventBus();
        const listener = vi.fn();
        bus.once(WorkflowEvents.WORKFLOW_CANCELLED, listener);

        bus.emit(WorkflowEvents.WORKFLOW_CANCELLED, { workflow: record_make() });
        bus.emit(WorkflowEvents.WORKFLOW_CANCELLED, { workflow: record_make() });
        expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should propagate listener errors to the emitter', (): void => {
        const bus = new EventBus();
        const later = vi.fn();
        bus.on(WorkflowEvents.WORKFLOW_STARTED, (): void => {
            throw new Error('listener broke');
        });
        bus.on(WorkflowEvents.WORKFLOW_STARTED, later);

        expect((): void => bus.emit(WorkflowEvents.WORKFLOW_STARTED, {
            workflow: record_make(),
            frontier: [],
            dispatched: [],
        })).toThrow('listener broke');
        expect(later).not.toHaveBeenCalled();
    });

    it('should keep buses independent', (): void => {
        const a = new EventBus();
        const b = new EventBus();
        const listener = vi.fn();
        a.on(WorkflowEvents.WORKFLOW_FINISHED, listener);
        b.emit(WorkflowEvents.WORKFLOW_FINISHED, { workflow: record_make() });
        expect(listener).not.toHaveBeenCalled();
    });
});

describe('dag/events/plugins', (): void => {
    const settings = settings_resolve({}, {});

    it('should install plugins in order with a scoped logger', (): void => {
        const bus = new EventBus();
        const installed: string[] = [];
        const plugin_make = (name: string): WorkflowPlugin => ({
            name,
            install(context: PluginContext): void {
                installed.push(`${name}:${context.logger.scope}:${context.settings.queue}`);
            },
        });

        plugins_install(bus, [plugin_make('audit'), plugin_make('metrics')], settings, logger_silent());
        expect(installed).toEqual(['audit:silent:audit:default', 'metrics:silent:metrics:default']);
    });

    it('should copy the definition subject onto the workflow record', (): void => {
        const bus = new EventBus();
        plugins_install(bus, [new EntityAwarePlugin()], settings, logger_silent());

        const record = record_make();
        const event: WorkflowCreatingEvent = {
            definition: { name: 'orders', subject: { type: 'order', id: '42' } },
            record,
        };
        bus.emit(WorkflowEvents.WORKFLOW_CREATING, event);
        expect(record.subject).toEqual({ type: 'order', id: '42' });
    });

    it('should leave records without a subject alone', (): void => {
        const bus = new EventBus();
        plugins_install(bus, [new EntityAwarePlugin()], settings, logger_silent());

        const record = record_make();
        bus.emit(WorkflowEvents.WORKFLOW_CREATING, { definition: { name: 'orders', subject: null }, record });
        expect(record.subject).toBeNull();
    });

    it('should see records through typed payloads', (): void => {
        const bus = new EventBus();
        const names: string[] = [];
        bus.on(WorkflowEvents.WORKFLOW_CREATED, (event: WorkflowRecordEvent): void => {
            names.push(event.workflow.name);
        });
        bus.emit(WorkflowEvents.WORKFLOW_CREATED, { workflow: record_make() });
        expect(names).toEqual(['orders']);
    });
});
