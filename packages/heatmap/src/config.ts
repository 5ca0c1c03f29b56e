import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
    // Runtime
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // Output
    HEATMAP_SAVE_DIR: z.string().default('./output'),
    HEATMAP_FORMAT: z.enum(['png', 'jpeg', 'webp', 'svg']).default('png'),
    HEATMAP_DENSITY: z.coerce.number().int().positive().default(300),

    // Color scale / layout
    HEATMAP_DOMAIN_MIN: z.coerce.number().default(-5),
    HEATMAP_DOMAIN_MAX: z.coerce.number().default(5),
    HEATMAP_COLUMN_COUNT: z.coerce.number().int().min(1).default(4),
    HEATMAP_WEEK_START: z.coerce.number().int().min(0).max(6).default(0),
    HEATMAP_WEEKDAY_COUNT: z.coerce.number().int().min(1).max(7).default(5),

    // Data source
    HEATMAP_LOOKBACK_DAYS: z.coerce.number().int().positive().default(365),
    YAHOO_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com'),
});

export const config = envSchema.parse(process.env);

export type Config = z.infer<typeof envSchema>;
