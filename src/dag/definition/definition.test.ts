/**
 * @file Definition Builder Tests
 *
 * @module dag/definition
 */

import { describe, it, expect } from 'vitest';
import { WorkflowDefinition } from './WorkflowDefinition.js';
import { dependency_conditional } from './dependency.js';
import { typeIdentity_default } from './identity.js';
import { EventBus } from '../events/EventBus.js';
import { WorkflowEvents } from '../events/types.js';
import type { JobAddedEvent, JobAddingEvent, WorkflowAddingEvent } from '../events/types.js';
import {
    DefinitionSealedError,
    DuplicateJobError,
    UnresolvableDependencyError,
} from '../errors.js';

// ═══════════════════════════════════════════════════════════════════
// Test Fixtures
// ═══════════════════════════════════════════════════════════════════

class SendWelcomeEmail {}
class ChargeCard {}

/** Definition whose job ids default to the payload string itself. */
function named_create(name: string, events?: EventBus): WorkflowDefinition<string> {
    return new WorkflowDefinition<string>(name, {
        events,
        identity: (payload: unknown): string => String(payload),
    });
}

// ═══════════════════════════════════════════════════════════════════
// Jobs
// ═══════════════════════════════════════════════════════════════════

describe('dag/definition/job_add', (): void => {
    it('should default the id and name to the payload type', (): void => {
        const definition = new WorkflowDefinition<object>('signup');
        const id = definition.job_add(new SendWelcomeEmail());
        expect(id).toBe('SendWelcomeEmail');
        const node = definition.graph_build().node_get('SendWelcomeEmail');
        expect(node?.name).toBe('SendWelcomeEmail');
        expect(node?.type).toBe('SendWelcomeEmail');
    });

    it('should reject a second job of the same type without an explicit id', (): void => {
        const definition = new WorkflowDefinition<object>('signup');
        definition.job_add(new ChargeCard());
        expect((): string => definition.job_add(new ChargeCard())).toThrow(DuplicateJobError);
        expect((): string => definition.job_add(new ChargeCard()))
            .toThrow("A job or nested workflow with id 'ChargeCard' already exists; pass an explicit id");
    });

    it('should accept several jobs of one type under explicit ids', (): void => {
        const definition = new WorkflowDefinition<object>('billing');
        definition.job_add(new ChargeCard(), [], { id: 'charge-1' });
        definition.job_add(new ChargeCard(), ['charge-1'], { id: 'charge-2' });
        expect(definition.jobIds_list()).toEqual(['charge-1', 'charge-2']);
        expect(definition.job_has('charge-2', ['charge-1'])).toBe(true);
    });

    it('should reject dependencies that have not been added yet', (): void => {
        const definition = named_create('flow');
        expect((): string => definition.job_add('b', ['a'])).toThrow(UnresolvableDependencyError);
        expect((): string => definition.job_add('b', ['a'])).toThrow("Job 'b' depends on 'a', which has not been added");
        expect(definition.jobIds_list()).toEqual([]);
    });

    it('should store name, queue routing and gating options', (): void => {
        const definition = new WorkflowDefinition<string>('flow', { queue: 'mail', connection: 'redis' });
        definition.job_add('x', [], { id: 'x', name: 'Send it' });
        definition.job_add('y', [], { id: 'y', queue: 'urgent' });
        definition.gatedJob_add('z', [], { id: 'z' });

        const graph = definition.graph_build();
        expect(graph.node_get('x')?.name).toBe('Send it');
        expect(graph.node_get('x')?.queue).toEqual({ queue: 'mail', connection: 'redis' });
        expect(graph.node_get('y')?.queue).toEqual({ queue: 'urgent', connection: 'redis' });
        expect(graph.node_get('z')?.gated).toBe(true);
        expect(graph.node_get('x')?.gated).toBe(false);
    });

    it('should convert a Date delay into milliseconds from now', (): void => {
        const now = new Date('2026-01-01T00:00:00.000Z');
        const definition = new WorkflowDefinition<string>('flow', { clock: (): Date => now });
        definition.job_add('later', [], { id: 'later', delay: new Date('2026-01-01T00:00:05.000Z') });
        definition.job_add('past', [], { id: 'past', delay: new Date('2025-12-31T00:00:00.000Z') });
        definition.job_add('soon', [], { id: 'soon', delay: 250 });

        expect(definition.job_has('later', [], 5000)).toBe(true);
        expect(definition.job_has('past', [], 0)).toBe(true);
        expect(definition.job_has('soon', undefined, 250)).toBe(true);
        expect(definition.job_has('soon', undefined, 300)).toBe(false);
    });

    it('should reject negative delays', (): void => {
        const definition = named_create('flow');
        expect((): string => definition.job_add('a', [], { delay: -1 })).toThrow(RangeError);
    });
});

// ═══════════════════════════════════════════════════════════════════
// Events
// ═══════════════════════════════════════════════════════════════════

describe('dag/definition events', (): void => {
    it('should let JobAdding subscribers change id, name and delay', (): void => {
        const events = new EventBus();
        events.on(WorkflowEvents.JOB_ADDING, (event: JobAddingEvent): void => {
            event.draft.id = `${event.draft.id}-v2`;
            event.draft.name = 'Renamed';
            event.draft.delay = 10;
        });
        const definition = named_create('flow', events);

        expect(definition.job_add('a')).toBe('a-v2');
        expect(definition.job_has('a-v2', [], 10)).toBe(true);
        expect(definition.graph_build().node_get('a-v2')?.name).toBe('Renamed');
    });

    it('should abort the add when a JobAdding subscriber throws', (): void => {
        const events = new EventBus();
        events.on(WorkflowEvents.JOB_ADDING, (): void => {
            throw new Error('not today');
        });
        const definition = named_create('flow', events);

        expect((): string => definition.job_add('a')).toThrow('not today');
        expect(definition.jobIds_list()).toEqual([]);
    });

    it('should publish JobAdded with the stored node', (): void => {
        const events = new EventBus();
        const added: string[] = [];
        events.on(WorkflowEvents.JOB_ADDED, (event: JobAddedEvent): void => {
            added.push(`${event.definition.name}:${event.node.id}<-${event.node.dependencies.join(',')}`);
        });
        const definition = named_create('flow', events);
        definition.job_add('a');
        definition.job_add('b', ['a']);

        expect(added).toEqual(['flow:a<-', 'flow:b<-a']);
    });

    it('should let WorkflowAdding subscribers rename a nested workflow', (): void => {
        const events = new EventBus();
        events.on(WorkflowEvents.WORKFLOW_ADDING, (event: WorkflowAddingEvent): void => {
            event.draft.id = 'renamed';
        });
        const child = named_create('child');
        child.job_add('x');
        const parent = named_create('parent', events);

        expect(parent.workflow_add(child)).toBe('renamed');
        expect(parent.jobIds_list()).toEqual(['renamed.x']);
    });
});

// ═══════════════════════════════════════════════════════════════════
// Nested workflows
// ═══════════════════════════════════════════════════════════════════

describe('dag/definition/workflow_add', (): void => {
    it('should prefix child ids and wire roots and terminals', (): void => {
        const child = named_create('child');
        child.job_add('a');
        child.job_add('b', ['a']);
        child.job_add('c');

        const parent = named_create('parent');
        parent.job_add('start');
        expect(parent.workflow_add(child, ['start'], { id: 'sub' })).toBe('sub');
        parent.job_add('final', ['sub']);

        expect(parent.jobIds_list()).toEqual(['start', 'sub.a', 'sub.b', 'sub.c', 'final']);
        expect(parent.job_has('sub.a', ['start'])).toBe(true);
        expect(parent.job_has('sub.b', ['sub.a'])).toBe(true);
        expect(parent.job_has('sub.c', ['start'])).toBe(true);
        expect(parent.job_has('final', ['sub.b', 'sub.c'])).toBe(true);
        expect(parent.job_has('final', ['sub'])).toBe(true);
        expect(parent.workflow_has('sub', ['start'])).toBe(true);
        expect(parent.workflow_has('sub', [])).toBe(false);
    });

    it('should default the nested id to the child name', (): void => {
        const child = named_create('payments');
        child.job_add('charge');
        const parent = named_create('checkout');

        expect(parent.workflow_add(child)).toBe('payments');
        expect(parent.workflow_has('payments')).toBe(true);
        expect(parent.jobIds_list()).toEqual(['payments.charge']);
    });

    it('should re-export nested workflows of the child', (): void => {
        const grandchild = named_create('inner');
        grandchild.job_add('x');
        const child = named_create('middle');
        child.job_add('y');
        child.workflow_add(grandchild, ['y'], { id: 'g' });
        const parent = named_create('outer');
        parent.workflow_add(child, [], { id: 'c' });
        parent.job_add('z', ['c.g']);

        expect(parent.jobIds_list()).toEqual(['c.y', 'c.g.x', 'z']);
        expect(parent.job_has('c.g.x', ['c.y'])).toBe(true);
        expect(parent.job_has('z', ['c.g.x'])).toBe(true);
    });

    it('should reject an id that is already taken', (): void => {
        const child = named_create('child');
        child.job_add('x');
        const parent = named_create('parent');
        parent.job_add('child');

        expect((): string => parent.workflow_add(child)).toThrow(DuplicateJobError);
    });

    it('should add none of the child jobs when a prefixed id collides', (): void => {
        const child = named_create('child');
        child.job_add('x');
        child.job_add('a');
        const parent = named_create('parent');
        parent.job_add('first', [], { id: 'sub.a' });

        expect((): string => parent.workflow_add(child, [], { id: 'sub' })).toThrow("A job or nested workflow with id 'sub.a' already exists");
        expect(parent.jobIds_list()).toEqual(['sub.a']);
        expect(parent.workflow_has('sub')).toBe(false);
    });

    it('should seal the child', (): void => {
        const child = named_create('child');
        child.job_add('x');
        named_create('parent').workflow_add(child);
        expect(child.isSealed()).toBe(true);
    });
});

// ═══════════════════════════════════════════════════════════════════
// Conditional structure
// ═══════════════════════════════════════════════════════════════════

describe('dag/definition conditional structure', (): void => {
    function branching_build(includeOptional: boolean, fallback?: string): WorkflowDefinition<string> {
        const definition = named_create('branching');
        definition.job_add('base');
        definition.when(includeOptional, (d: WorkflowDefinition<string>): void => {
            d.job_add('optional', ['base']);
        });
        definition.job_add('after', [dependency_conditional('optional', fallback)]);
        return definition;
    }

    it('should depend on the primary when its branch ran', (): void => {
        expect(branching_build(true, 'base').job_has('after', ['optional'])).toBe(true);
    });

    it('should fall back when the primary is absent', (): void => {
        expect(branching_build(false, 'base').job_has('after', ['base'])).toBe(true);
    });

    it('should resolve to no dependency when neither exists', (): void => {
        expect(branching_build(false).job_has('after', [])).toBe(true);
    });

    it('should reject a fallback that does not exist', (): void => {
        expect((): WorkflowDefinition<string> => branching_build(false, 'nowhere')).toThrow(UnresolvableDependencyError);
    });

    it('should evaluate thunk conditions', (): void => {
        const definition = named_create('flow');
        definition.when((): boolean => false, (d: WorkflowDefinition<string>): void => {
            d.job_add('skipped');
        });
        expect(definition.jobIds_list()).toEqual([]);
    });
});

// ═══════════════════════════════════════════════════════════════════
// Sealing and callbacks
// ═══════════════════════════════════════════════════════════════════

describe('dag/definition/graph_build', (): void => {
    it('should return the same graph and refuse later changes', (): void => {
        const definition = named_create('flow');
        definition.job_add('a');
        const graph = definition.graph_build();

        expect(definition.graph_build()).toBe(graph);
        expect((): string => definition.job_add('b')).toThrow(DefinitionSealedError);
        expect((): WorkflowDefinition<string> => definition.then((): void => {})).toThrow(DefinitionSealedError);
    });

    it('should keep then and catch callbacks in registration order', (): void => {
        const first = (): void => {};
        const second = (): void => {};
        const onFailure = (): void => {};
        const definition = named_create('flow').then(first).then(second).catch(onFailure);

        expect(definition.thenCallbacks_list()).toEqual([first, second]);
        expect(definition.catchCallbacks_list()).toEqual([onFailure]);
    });

    it('should report missing jobs and workflows', (): void => {
        const definition = named_create('flow');
        expect(definition.job_has('nope')).toBe(false);
        expect(definition.workflow_has('nope')).toBe(false);
    });
});

describe('dag/definition/identity', (): void => {
    it('should name payloads by class, function or primitive type', (): void => {
        expect(typeIdentity_default(new ChargeCard())).toBe('ChargeCard');
        expect(typeIdentity_default({ plain: true })).toBe('Object');
        expect(typeIdentity_default(function resizeImage(): void {})).toBe('resizeImage');
        expect(typeIdentity_default(42)).toBe('number');
        expect(typeIdentity_default(Object.create(null))).toBe('Object');
    });
});
