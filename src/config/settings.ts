/**
 * @file Engine Settings Service
 *
 * Engine-wide settings with central validation and deterministic
 * precedence (explicit override > env > defaults).
 *
 * The table settings name the directories the workflow store writes
 * workflow and job records under.
 *
 * @module config/settings
 */

import { z } from 'zod';
import { SettingsError } from '../dag/errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const TableNameSchema = z
    .string()
    .regex(/^[a-z][a-z0-9_-]*$/, 'table names must be lowercase identifiers');

export const SettingsSchema = z.object({
    queue:          z.string().min(1),
    connection:     z.string().min(1),
    storePath:      z.string().min(1),
    workflowsTable: TableNameSchema,
    jobsTable:      TableNameSchema,
    logLevel:       z.enum(LOG_LEVELS),
});

export type EngineSettings = z.infer<typeof SettingsSchema>;
export type SettingsKey = keyof EngineSettings;
export type SettingSource = 'override' | 'env' | 'default';

export const SETTINGS_KEYS: readonly SettingsKey[] = [
    'queue',
    'connection',
    'storePath',
    'workflowsTable',
    'jobsTable',
    'logLevel',
];

const ENV_KEYS: Record<SettingsKey, string> = {
    queue:          'DAGFLOW_QUEUE',
    connection:     'DAGFLOW_CONNECTION',
    storePath:      'DAGFLOW_STORE_PATH',
    workflowsTable: 'DAGFLOW_WORKFLOWS_TABLE',
    jobsTable:      'DAGFLOW_JOBS_TABLE',
    logLevel:       'DAGFLOW_LOG_LEVEL',
};

const DEFAULTS: EngineSettings = {
    queue:          'default',
    connection:     'default',
    storePath:      '.dagflow',
    workflowsTable: 'workflows',
    jobsTable:      'workflow_jobs',
    logLevel:       'info',
};

export type Environment = Record<string, string | undefined>;

export class SettingsService {
    private readonly overrides: Partial<EngineSettings> = {};

    constructor(private readonly env: Environment = process.env) {}

    /**
     * Return effective settings.
     */
    public snapshot(): EngineSettings {
        const merged: Record<string, unknown> = {};
        for (const key of SETTINGS_KEYS) {
            merged[key] = this.value_resolve(key).value;
        }
        return SettingsSchema.parse(merged);
    }

    /**
     * Resolve where the effective value of one setting comes from.
     */
    public source(key: SettingsKey): SettingSource {
        return this.value_resolve(key).source;
    }

    /**
     * Override one setting with validation.
     */
    public set<K extends SettingsKey>(key: K, value: unknown): { ok: true; value: EngineSettings[K] } | { ok: false; error: string } {
        if (!SETTINGS_KEYS.includes(key)) {
            return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }

        const parsed = SettingsSchema.safeParse({ ...this.snapshot(), [key]: value });
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            return { ok: false, error: `Invalid value for ${key}: ${issue ? issue.message : String(value)}` };
        }

        this.overrides[key] = parsed.data[key];
        return { ok: true, value: parsed.data[key] };
    }

    /**
     * Remove one override.
     */
    public unset(key: SettingsKey): void {
        delete this.overrides[key];
    }

    private value_resolve(key: SettingsKey): { value: unknown; source: SettingSource } {
        const override = this.overrides[key];
        if (override !== undefined) {
            return { value: override, source: 'override' };
        }

        const envRaw = this.env[ENV_KEYS[key]];
        if (envRaw !== undefined && envRaw !== '' && SettingsSchema.shape[key].safeParse(envRaw).success) {
            return { value: envRaw, source: 'env' };
        }

        return { value: DEFAULTS[key], source: 'default' };
    }
}

/**
 * Resolve settings from explicit overrides and the environment.
 *
 * @throws SettingsError naming every rejected override
 */
export function settings_resolve(
    overrides: Partial<Record<SettingsKey, unknown>> = {},
    env: Environment = process.env,
): EngineSettings {
    const service = new SettingsService(env);
    const errors: string[] = [];
    for (const key of SETTINGS_KEYS) {
        if (overrides[key] === undefined) continue;
        const result = service.set(key, overrides[key]);
        if (!result.ok) errors.push(result.error);
    }
    if (errors.length > 0) {
        throw new SettingsError(errors);
    }
    return service.snapshot();
}
