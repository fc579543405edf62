// Environment configuration for the fiscal printer service
import { z } from 'zod';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const milliseconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  /** SQLite file holding the service configuration, `:memory:` for a throwaway store */
  FP_DATABASE_PATH: z.string().min(1).default('fiscal-printer-service.db'),
  FP_AUTO_DETECT: booleanFlag(true),
  /** How long a synchronous caller waits for its job before getting the task id back */
  FP_DEFAULT_ASYNC_TIMEOUT: milliseconds(29000),
  /** How long finished tasks stay queryable */
  FP_TASK_RETENTION: milliseconds(24 * 60 * 60 * 1000),
  /** Time allowed for a device to answer one command */
  FP_DEVICE_READ_TIMEOUT: milliseconds(15000),
  DEBUG_LOGGING: booleanFlag(false),
});

export type EnvironmentConfig = z.infer<typeof EnvironmentSchema>;

// Empty strings count as unset
function readEnv(source: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') values[key] = value;
  }
  return values;
}

/**
 * @throws Error listing every invalid variable
 */
export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const result = EnvironmentSchema.safeParse(readEnv(source));
  if (!result.success) {
    const messages = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment: ${messages}`);
  }
  return result.data;
}

// Environment configuration
export const environment: EnvironmentConfig = loadEnvironment();
