/**
 * @file Workflow Plugins
 *
 * A plugin is an object that subscribes to an engine's event bus when the
 * engine is created. Plugins see every lifecycle event and may edit the
 * drafts carried by -ing events.
 *
 * @module dag/events
 */

import type { EngineSettings } from '../../config/settings.js';
import type { Logger } from '../../logging/logger.js';
import type { EventBus } from './EventBus.js';
import type { WorkflowCreatingEvent } from './types.js';
import { WorkflowEvents } from './types.js';

/**
 * What a plugin receives at install time.
 *
 * @property events - The engine's bus
 * @property settings - Effective engine settings
 * @property logger - Logger scoped to the plugin
 */
export interface PluginContext {
    events: EventBus;
    settings: Readonly<EngineSettings>;
    logger: Logger;
}

export interface WorkflowPlugin {
    readonly name: string;
    install(context: PluginContext): void;
}

/**
 * Install plugins in order. A plugin that throws stops installation and
 * the error reaches the caller.
 */
export function plugins_install(
    events: EventBus,
    plugins: readonly WorkflowPlugin[],
    settings: Readonly<EngineSettings>,
    logger: Logger,
): void {
    for (const plugin of plugins) {
        plugin.install({ events, settings, logger: logger.child(plugin.name) });
        logger.debug(`plugin installed: ${plugin.name}`);
    }
}

/**
 * Stamps the definition's subject onto every workflow record it creates,
 * so runs can be looked up by the entity they belong to.
 */
export class EntityAwarePlugin implements WorkflowPlugin {
    readonly name = 'entity-aware';

    install(context: PluginContext): void {
        context.events.on(WorkflowEvents.WORKFLOW_CREATING, (event: WorkflowCreatingEvent): void => {
            if (event.definition.subject) {
                event.record.subject = { ...event.definition.subject };
            }
        });
    }
}
