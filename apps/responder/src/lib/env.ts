import { z } from 'zod';

const boolFromString = (v: string | undefined, def: boolean) => {
  if (v === undefined || v.trim() === '') return def;
  return v === 'true' || v === '1' || v === 'yes';
};

const numeric = (def: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? def : Number(v)))
    .pipe(z.number().finite());

const percent = (def: number) => numeric(def).pipe(z.number().min(0).max(100));

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant that responds to chat messages professionally and concisely. Keep responses brief and actionable.';

const schema = z
  .object({
    NODE_ENV: z.string().optional(),
    PORT: numeric(8080).pipe(z.number().int().min(0).max(65535)),
    HOST: z.string().optional(),
    WEBHOOK_PATH: z
      .string()
      .regex(/^\/[A-Za-z0-9._~\-/]*$/, 'WEBHOOK_PATH must start with /')
      .optional(),
    MAX_BODY_BYTES: numeric(1024 * 1024).pipe(z.number().int().positive()),
    REQUEST_TIMEOUT_MS: numeric(15_000).pipe(z.number().int().positive()),
    DATABASE_URL: z.string().min(1),
    // Where approved replies are posted (a catch-hook style URL)
    RELAY_WEBHOOK_URL: z.string().url().optional(),
    RELAY_TIMEOUT_MS: numeric(10_000).pipe(z.number().int().positive()),
    OLLAMA_URL: z.string().url().optional(),
    GENERATION_MODEL: z.string().optional(),
    GENERATION_TEMPERATURE: numeric(0.7),
    GENERATION_TOP_P: numeric(0.9),
    GENERATION_TOP_K: numeric(40).pipe(z.number().int()),
    GENERATION_TIMEOUT_MS: numeric(30_000).pipe(z.number().int().positive()),
    SYSTEM_PROMPT: z.string().optional(),
    AUTO_GENERATE: z.string().optional(),
    SIMILARITY_DISPLAY_THRESHOLD: percent(30),
    SIMILARITY_AUTO_RESPONSE_THRESHOLD: percent(90),
    QUEUE_CAPACITY: numeric(256).pipe(z.number().int().positive()),
    // empty disables the admin routes
    ADMIN_TOKEN: z.union([z.literal(''), z.string().min(6)]).optional(),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    HTTP_LOG: z.string().optional()
  })
  .refine((v) => v.SIMILARITY_AUTO_RESPONSE_THRESHOLD >= v.SIMILARITY_DISPLAY_THRESHOLD, {
    message: 'SIMILARITY_AUTO_RESPONSE_THRESHOLD must not be lower than SIMILARITY_DISPLAY_THRESHOLD',
    path: ['SIMILARITY_AUTO_RESPONSE_THRESHOLD']
  });

export type AppConfig = ReturnType<typeof loadConfig>;

/**
 * Parses and validates the process environment. Every component receives the
 * resulting object (or the slice it needs) at construction time.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const parsed = schema.parse(source);
  return {
    nodeEnv: parsed.NODE_ENV ?? 'production',
    port: parsed.PORT,
    host: parsed.HOST || '0.0.0.0',
    webhookPath: parsed.WEBHOOK_PATH ?? '/zapier-webhook',
    maxBodyBytes: parsed.MAX_BODY_BYTES,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    databaseUrl: parsed.DATABASE_URL,
    relayUrl: parsed.RELAY_WEBHOOK_URL || undefined,
    relayTimeoutMs: parsed.RELAY_TIMEOUT_MS,
    ollamaUrl: (parsed.OLLAMA_URL ?? 'http://localhost:11434').replace(/\/+$/, ''),
    model: parsed.GENERATION_MODEL ?? 'granite3.3:2b',
    temperature: parsed.GENERATION_TEMPERATURE,
    topP: parsed.GENERATION_TOP_P,
    topK: parsed.GENERATION_TOP_K,
    generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    systemPrompt: parsed.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    autoGenerate: boolFromString(parsed.AUTO_GENERATE, true),
    displayThreshold: parsed.SIMILARITY_DISPLAY_THRESHOLD,
    autoResponseThreshold: parsed.SIMILARITY_AUTO_RESPONSE_THRESHOLD,
    queueCapacity: parsed.QUEUE_CAPACITY,
    adminToken: parsed.ADMIN_TOKEN || undefined,
    logLevel: parsed.LOG_LEVEL ?? 'info',
    httpLog: boolFromString(parsed.HTTP_LOG, true)
  };
}
