import { describe, it, expect } from 'vitest';
import { logger_create, logger_silent, type LogSink } from './logger.js';

interface CapturedSink extends LogSink {
    out: string[];
    err: string[];
}

function sink_create(): CapturedSink {
    const out: string[] = [];
    const err: string[] = [];
    return {
        out,
        err,
        log: (line: string): void => {
            out.push(line);
        },
        error: (line: string): void => {
            err.push(line);
        },
    };
}

describe('logging/logger', (): void => {
    it('should prefix each level with its marker and scope', (): void => {
        const sink = sink_create();
        const logger = logger_create('engine', { level: 'debug', sink, color: false });

        logger.debug('graph built');
        logger.info('workflow started');
        logger.warn('job failed');
        logger.error('store offline');

        expect(sink.out).toEqual([
            '· [engine] graph built',
            '○ [engine] workflow started',
            '>> WARNING: [engine] job failed',
        ]);
        expect(sink.err).toEqual(['>> ERROR: [engine] store offline']);
    });

    it('should drop lines below the configured level', (): void => {
        const sink = sink_create();
        const logger = logger_create('engine', { level: 'warn', sink, color: false });

        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('shown');

        expect(sink.out).toEqual(['>> WARNING: [engine] shown']);
    });

    it('should default to info', (): void => {
        const sink = sink_create();
        const logger = logger_create('engine', { sink, color: false });

        logger.debug('hidden');
        logger.info('shown');

        expect(logger.level).toBe('info');
        expect(sink.out).toEqual(['○ [engine] shown']);
    });

    it('should nest child scopes and keep the parent options', (): void => {
        const sink = sink_create();
        const child = logger_create('engine', { level: 'error', sink, color: false }).child('plugin');

        child.warn('hidden');
        child.error('broken');

        expect(child.scope).toBe('engine:plugin');
        expect(sink.err).toEqual(['>> ERROR: [engine:plugin] broken']);
    });

    it('should build a silent logger', (): void => {
        const logger = logger_silent();
        expect(logger.level).toBe('silent');
        expect(logger.scope).toBe('silent');
    });
});
