/**
 * @file Event Bus
 *
 * Typed facade over Node.js EventEmitter for workflow lifecycle events.
 * One bus is owned by each engine (and shared with the definitions it
 * starts); there is no process-wide instance.
 *
 * Listeners run synchronously in registration order. A listener that
 * throws aborts the emit and the error reaches the caller, which for
 * -ing events aborts the operation in progress.
 *
 * @module dag/events
 */

import { EventEmitter } from 'events';
import type { EventListener, EventPayloads, WorkflowEvents } from './types.js';

export class EventBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to an event.
     *
     * @returns Unsubscribe function.
     */
    on<K extends WorkflowEvents>(event: K, listener: EventListener<K>): () => void {
        this.emitter.on(event, listener);
        return () => this.emitter.off(event, listener);
    }

    /**
     * Subscribe for the next occurrence only.
     *
     * @returns Unsubscribe function (no-op once fired).
     */
    once<K extends WorkflowEvents>(event: K, listener: EventListener<K>): () => void {
        this.emitter.once(event, listener);
        return () => this.emitter.off(event, listener);
    }

    emit<K extends WorkflowEvents>(event: K, payload: EventPayloads[K]): void {
        this.emitter.emit(event, payload);
    }

    listenerCount(event: WorkflowEvents): number {
        return this.emitter.listenerCount(event);
    }
}
