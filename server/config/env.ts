import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    EVENT_HISTORY_SIZE: z.coerce.number().int().positive().default(1000),
    MIN_PLAYERS: z.coerce.number().int().positive().default(3),
    MAX_PLAYERS: z.coerce.number().int().positive().default(20),
    DEFAULT_DISCUSSION_TIME: z.coerce.number().int().min(1).max(60).default(3),
    SNAPSHOT_PATH: z.string().default('./data/snapshot.json'),
    REGULATION_PRESETS_PATH: z.string().default('./data/regulations.json'),
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);

// Jest sets NODE_ENV=test; keep test output quiet unless LOG_LEVEL asks otherwise.
export const logLevel = env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info');
