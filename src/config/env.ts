/**
 * @fileoverview Environment configuration with Zod validation
 *
 * This module validates and exports environment variables for the webhook
 * backend. Configuration is validated once at startup using Zod schemas,
 * so every other module receives typed values (numbers as numbers,
 * booleans as booleans) and never reads `process.env` directly.
 *
 * @module config/env
 * @license MIT
 */

import { z } from 'zod';

/**
 * Boolean flag read from a string variable. Accepts `true`, `1` and `yes`
 * (any case); every other value, including `false`, is false.
 */
const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined ? defaultValue : ['true', '1', 'yes'].includes(value.trim().toLowerCase())
    );

const milliseconds = (defaultValue: number) => z.coerce.number().int().min(0).default(defaultValue);

/**
 * Zod schema for validating environment configuration.
 *
 * @description
 * **Required Variables:**
 * - `WHATSAPP_ACCESS_TOKEN` - Graph API bearer token
 * - `WHATSAPP_PHONE_NUMBER_ID` - Business phone number id (digits)
 * - `VERIFY_TOKEN` - Secret echoed back during webhook verification
 * - `AI_API_KEY` - Key for the chat completions endpoint
 *
 * **Optional Variables (with defaults):**
 * - `WEBHOOK_PORT` - 1-65535, defaults to 3000
 * - `DATABASE_PATH` / `SESSION_DATABASE_PATH` - SQLite files
 * - `DEDUP_TTL_MS`, `DEBOUNCE_MS`, `MAX_WAIT_MS` - buffering windows
 * - `LOG_LEVEL` - debug/info/warn/error, defaults to "info"
 */
export const envSchema = z
  .object({
    // WhatsApp Cloud API
    WHATSAPP_ACCESS_TOKEN: z.string().min(1, 'WhatsApp access token is required'),
    WHATSAPP_PHONE_NUMBER_ID: z.string().regex(/^\d+$/, 'Phone number id must contain only digits'),
    WHATSAPP_GRAPH_URL: z
      .string()
      .url('Graph URL must be a valid URL')
      .default('https://graph.facebook.com/v23.0')
      .transform((url) => url.replace(/\/+$/, '')),
    VERIFY_TOKEN: z.string().min(1, 'Verify token is required'),
    APP_SECRET: z.string().min(1).optional(),

    // Webhook Server
    WEBHOOK_PORT: z.coerce.number().min(1).max(65535).default(3000),
    HTTP_TIMEOUT_MS: milliseconds(15_000),

    // Databases
    DATABASE_PATH: z.string().default('./data/wa-relay.db'),
    SESSION_DATABASE_PATH: z.string().default('./data/ai-sessions.db'),

    // Buffering
    DEDUP_TTL_MS: milliseconds(120_000),
    DEBOUNCE_MS: milliseconds(10_000),
    MAX_WAIT_MS: milliseconds(20_000),
    BUFFER_CHECK_INTERVAL_MS: z.coerce.number().int().min(10).default(1_000),
    BUFFER_SWEEP_INTERVAL_MS: z.coerce.number().int().min(100).default(5_000),
    TYPING_DELAY_MS: milliseconds(3_000),

    // AI responder
    AI_API_KEY: z.string().min(1, 'AI API key is required'),
    AI_BASE_URL: z
      .string()
      .url('AI base URL must be a valid URL')
      .default('https://api.openai.com/v1')
      .transform((url) => url.replace(/\/+$/, '')),
    AI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    AI_SYSTEM_PROMPT_PATH: z.string().default('./prompts/system.txt'),
    AI_HISTORY_LIMIT: z.coerce.number().int().min(1).max(200).default(30),
    AI_FALLBACK_REPLY: z
      .string()
      .min(1)
      .default("Sorry, I couldn't process your message right now. Please try again in a moment."),
    AI_ENABLED: booleanFlag(true),
    AI_TIMEOUT_MS: milliseconds(60_000),

    // Operator backend (source of operator-sent media files)
    OPERATOR_MEDIA_BASE_URL: z
      .string()
      .url('Operator media base URL must be a valid URL')
      .transform((url) => url.replace(/\/+$/, ''))
      .optional(),
    OPERATOR_MEDIA_TIMEOUT_MS: milliseconds(120_000),

    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .refine((env) => env.MAX_WAIT_MS >= env.DEBOUNCE_MS, {
    message: 'MAX_WAIT_MS must be greater than or equal to DEBOUNCE_MS',
    path: ['MAX_WAIT_MS'],
  });

/**
 * Validated configuration type inferred from {@link envSchema}.
 */
export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parse an environment-like record without side effects.
 *
 * @throws {z.ZodError} If any variable is missing or invalid
 */
export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
  return envSchema.parse(source);
}

/**
 * Parse and validate `process.env`.
 *
 * @description
 * If validation fails, every issue is written to stderr and the process
 * exits with code 1.
 */
export function loadConfig(): EnvConfig {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Environment validation failed:');
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      process.exit(1);
    }
    throw error;
  }
}
