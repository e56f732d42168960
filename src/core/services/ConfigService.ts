import path from 'node:path';
import * as fs from 'node:fs';
import { DEFAULT_THRESHOLDS, type Thresholds } from '../models/thresholds';

export interface CacheConfig {
    /** Entry lifetime in milliseconds; 0 keeps entries until cleared. */
    ttlMs: number;
}

export interface ProcessingConfig {
    /** Photos loaded and scored at once. */
    maxConcurrency: number;
    /** Write ranked faces to the face-quality table. */
    persistResults: boolean;
}

export interface DatabaseConfig {
    path: string;
}

export interface EngineConfig {
    thresholds: Thresholds;
    cache: CacheConfig;
    processing: ProcessingConfig;
    database: DatabaseConfig;
}

// Default Config
export const DEFAULT_CONFIG: EngineConfig = {
    thresholds: DEFAULT_THRESHOLDS,
    cache: { ttlMs: 0 },
    processing: { maxConcurrency: 4, persistResults: false },
    database: { path: ':memory:' }
};

export type DeepPartial<T> = {
    [K in keyof T]?: T[K] extends (infer U)[] ? U[] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy `override` onto a clone of `base`, keeping only keys `base` already
 * has and values of the same shape.
 */
export function mergeDeep<T extends object>(base: T, override: unknown): T {
    const result = structuredClone(base);
    if (!isPlainObject(override)) return result;

    for (const [key, value] of Object.entries(override)) {
        if (!Object.prototype.hasOwnProperty.call(result, key)) continue;
        const current: unknown = Reflect.get(result, key);

        if (isPlainObject(current)) {
            if (isPlainObject(value)) Reflect.set(result, key, mergeDeep(current, value));
        } else if (Array.isArray(current)) {
            if (Array.isArray(value) && value.every(isPlainObject)) Reflect.set(result, key, value);
        } else if (typeof value === typeof current && !(typeof value === 'number' && Number.isNaN(value))) {
            Reflect.set(result, key, value);
        }
    }
    return result;
}

export class ConfigService {
    private static configPath = process.env.FACE_ENGINE_CONFIG || path.join(process.cwd(), 'face-engine.config.json');
    private static config: EngineConfig | null = null;

    private static load(): EngineConfig {
        if (this.config) return this.config;
        try {
            if (fs.existsSync(this.configPath)) {
                const raw = fs.readFileSync(this.configPath, 'utf8');
                const parsed: unknown = JSON.parse(raw);
                this.config = mergeDeep(DEFAULT_CONFIG, parsed);
            } else {
                this.config = structuredClone(DEFAULT_CONFIG);
            }
        } catch (e) {
            console.error('Failed to load config, using defaults:', e);
            this.config = structuredClone(DEFAULT_CONFIG);
        }
        return this.config;
    }

    private static save() {
        try {
            fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2));
        } catch (e) {
            console.error('Failed to save config:', e);
        }
    }

    static getConfigPath(): string {
        return this.configPath;
    }

    /** Point at another config file and drop the loaded copy. */
    static useConfigFile(configPath: string) {
        this.configPath = configPath;
        this.config = null;
    }

    static reload(): EngineConfig {
        this.config = null;
        return this.load();
    }

    static getSettings(): EngineConfig {
        return this.load();
    }

    static updateSettings(partial: DeepPartial<EngineConfig>) {
        this.config = mergeDeep(this.load(), partial);
        this.save();
    }

    static getThresholds(): Thresholds { return this.getSettings().thresholds; }

    static getCacheConfig(): CacheConfig { return this.getSettings().cache; }

    static getProcessingConfig(): ProcessingConfig { return this.getSettings().processing; }

    static getDatabaseConfig(): DatabaseConfig { return this.getSettings().database; }
}
