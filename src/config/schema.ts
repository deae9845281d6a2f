import { z } from 'zod';
import { MAX_INTERVAL_SECONDS, MAX_TIMER_MS } from './defaults';

// ── Shared pieces ────────────────────────────────────────────

const portSchema = z.number().int().min(1).max(65535);

const commandLineSchema = z.array(z.string().min(1)).min(1);

export const dependencySchema = z.object({
  host: z.string().min(1),
  port: portSchema,
});

// ── Sections ─────────────────────────────────────────────────

const readinessSchema = z
  .object({
    intervalSeconds: z.number().nonnegative().max(MAX_INTERVAL_SECONDS),
    maxAttempts: z.number().int().positive(),
    connectTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS),
    onTimeout: z.enum(['continue', 'abort']),
    strategy: z.enum(['sequential', 'parallel']),
  })
  .partial()
  .strict();

const testCommandsSchema = z
  .object({
    erase: commandLineSchema,
    run: commandLineSchema,
    summary: commandLineSchema,
    html: commandLineSchema,
    xml: commandLineSchema,
    upload: commandLineSchema,
  })
  .partial()
  .strict();

const commandsSchema = z
  .object({
    migrate: commandLineSchema,
    serve: commandLineSchema,
    serveDev: commandLineSchema,
    worker: commandLineSchema,
    test: testCommandsSchema,
    shell: z
      .object({
        command: commandLineSchema,
        hint: z.string(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

// ── Full config file ─────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    port: portSchema.optional(),
    dependencies: z.array(dependencySchema).optional(),
    readiness: readinessSchema.optional(),
    commands: commandsSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;
