import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  DATA_DIR: z.string().default('data'),
  OUTPUT_DIR: z.string().default('.'),
  DATA_FILE: z.string().default('card_data.json'),
  CATALOG_FILE_MARKER: z.string().min(1).default('TCG Collector'),
  MARKETPLACE_FILE_MARKER: z.string().min(1).default('Cardmarket'),
  // e.g. https://images.example.test/cards/{cardId}.jpg
  IMAGE_LOOKUP_URL: optionalString.refine(
    (value) => value === undefined || value.includes('{cardId}'),
    'IMAGE_LOOKUP_URL must contain a {cardId} placeholder',
  ),
  IMAGE_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  IMAGE_LOOKUP_CONCURRENCY: z.coerce.number().int().positive().default(4),
  // Whole batch; reports are written with whatever resolved by then
  IMAGE_LOOKUP_DEADLINE_MS: z.coerce.number().int().positive().default(60000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
