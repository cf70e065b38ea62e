import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import log from './logger';

const CONFIG_FILE = 'oect-config.json';

const positiveInt = z.number().int().positive();

export const CoreConfigSchema = z.object({
    biasCurrent: z.object({
        enabled: z.boolean().default(true),
        value: z.number().default(-1.2868e-6)
    }).default({}),
    transimpedanceOhms: z.number().default(100),
    serial: z.object({
        baudRate: positiveInt.default(512000),
        readChunkSize: positiveInt.default(4096),
        pollIntervalMs: positiveInt.default(100),
        identityTimeoutMs: positiveInt.default(3000)
    }).default({}),
    buffer: z.object({
        flushPacketCount: positiveInt.default(15),
        flushIntervalMs: positiveInt.default(80)
    }).default({}),
    save: z.object({
        rootDir: z.string().min(1).default(path.join('UserData', 'AutoSave')),
        workers: positiveInt.default(4),
        incrementalIntervalMs: positiveInt.default(2000)
    }).default({}),
    queue: z.object({
        capacity: positiveInt.default(10000)
    }).default({}),
    workflow: z.object({
        maxLoopIterations: positiveInt.default(1000)
    }).default({}),
    sync: z.object({
        // 0 waits forever
        timeoutMs: z.number().int().nonnegative().default(0)
    }).default({}),
    driver: z.object({
        stopWaitMs: positiveInt.default(5000)
    }).default({}),
    logging: z.object({
        dir: z.string().default('logs'),
        level: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('debug')
    }).default({})
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;
export type CoreConfigInput = z.input<typeof CoreConfigSchema>;

export const DEFAULT_CORE_CONFIG: CoreConfig = CoreConfigSchema.parse({});

export function getConfigPath(dir: string = process.cwd()): string {
    return path.join(dir, CONFIG_FILE);
}

/**
 * Builds a full config from partial overrides, filling every missing knob
 * with its default. Throws a ZodError on invalid values.
 */
export function resolveCoreConfig(overrides: CoreConfigInput = {}): CoreConfig {
    return CoreConfigSchema.parse(overrides);
}

export function loadCoreConfig(configPath: string = getConfigPath()): CoreConfig {
    try {
        if (fs.existsSync(configPath)) {
            const data = fs.readFileSync(configPath, 'utf-8');
            const parsed = CoreConfigSchema.safeParse(JSON.parse(data));
            if (parsed.success) {
                return parsed.data;
            }
            log.error(`[Config] Invalid config in ${configPath}:`, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
        }
    } catch (error) {
        log.error('[Config] Failed to load config:', error);
    }
    return DEFAULT_CORE_CONFIG;
}

export function saveCoreConfig(config: CoreConfig, configPath: string = getConfigPath()): void {
    try {
        fs.writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
    } catch (error) {
        log.error('[Config] Failed to save config:', error);
    }
}

/**
 * Transimpedance used for decoding; non-positive or non-finite values fall
 * back to the reference 100 ohm.
 */
export function effectiveTransimpedance(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value) || value <= 0) {
        return 100;
    }
    return value;
}

export function effectiveBiasCurrent(config: CoreConfig): number {
    return config.biasCurrent.enabled ? config.biasCurrent.value : 0;
}
