import * as path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors';

export type LlmMode = 'claude' | 'off';

export interface StudioConfig {
    /** sql.js database file, or null to keep the database in memory only */
    dbPath: string | null;
    host: string;
    port: number;
    llm: LlmMode;
    claudePath: string | null;
    catalogPath: string | null;
    debug: boolean;
}

const flag = z
    .string()
    .optional()
    .transform(value => value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()));

const envSchema = z.object({
    STUDIO_DB_PATH: z.string().optional(),
    STUDIO_HOST: z.string().min(1).default('127.0.0.1'),
    STUDIO_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
    STUDIO_LLM: z.enum(['claude', 'off']).default('off'),
    STUDIO_CLAUDE_PATH: z.string().optional(),
    STUDIO_CATALOG_PATH: z.string().optional(),
    STUDIO_DEBUG: flag,
});

/**
 * Reads configuration from environment variables.
 * Relative paths are resolved against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): StudioConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const issue = result.error.issues[0];
        const key = issue?.path.join('.') || 'environment';
        throw new ValidationError(`Invalid configuration for ${key}: ${issue?.message ?? 'unknown issue'}`);
    }
    const parsed = result.data;

    const rawDbPath = parsed.STUDIO_DB_PATH?.trim();
    let dbPath: string | null;
    if (rawDbPath === ':memory:') {
        dbPath = null;
    } else {
        dbPath = path.resolve(cwd, rawDbPath || path.join('.studio', 'studio.db'));
    }

    const claudePath = parsed.STUDIO_CLAUDE_PATH?.trim();
    const catalogPath = parsed.STUDIO_CATALOG_PATH?.trim();

    return {
        dbPath,
        host: parsed.STUDIO_HOST,
        port: parsed.STUDIO_PORT,
        llm: parsed.STUDIO_LLM,
        claudePath: claudePath ? claudePath : null,
        catalogPath: catalogPath ? path.resolve(cwd, catalogPath) : null,
        debug: parsed.STUDIO_DEBUG,
    };
}
