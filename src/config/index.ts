import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const HostSchema = z
  .string()
  .trim()
  .min(1, 'Modem host must not be empty')
  .refine(host => !/[\s/]/.test(host), 'Modem host must be a bare hostname or IP address, without scheme or path');

export const ConfigSchema = z.object({
  modem: z.object({
    host: HostSchema.default('192.168.100.1'),
    port: z.number().int().min(1).max(65535).default(80),
    useSsl: z.boolean().default(false),
  }).default({}),
  poll: z.object({
    intervalMs: z.number().int().positive().default(30000),
    timeoutMs: z.number().int().positive().default(10000),
    retries: z.number().int().min(0).default(0),
    retryDelayMs: z.number().int().min(0).default(500),
  }).default({}),
  endpoints: z.object({
    /** JSON file replacing the built-in endpoint strategy table. */
    tablePath: z.string().min(1).optional(),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/** Validates host-supplied settings before the first poll. */
export function validateConfig(input: unknown): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, {
      cause: result.error,
      context: { issues },
    });
  }
  return result.data;
}

function parseIntEnv(value: string | undefined, fallback: number): number {
  return parseInt(value ?? String(fallback), 10);
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  return validateConfig({
    modem: {
      host: env['MODEM_HOST'] ?? '192.168.100.1',
      port: parseIntEnv(env['MODEM_PORT'], 80),
      useSsl: env['MODEM_USE_SSL'] === 'true',
    },
    poll: {
      intervalMs: parseIntEnv(env['POLL_INTERVAL_MS'], 30000),
      timeoutMs: parseIntEnv(env['POLL_TIMEOUT_MS'], 10000),
      retries: parseIntEnv(env['POLL_RETRIES'], 0),
      retryDelayMs: parseIntEnv(env['POLL_RETRY_DELAY_MS'], 500),
    },
    endpoints: {
      tablePath: env['ENDPOINT_TABLE_PATH'] || undefined,
    },
  });
}
