import { z } from 'zod';

const EnvironmentSchema = z.enum(['local', 'preview', 'production']);

export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Returns the environment the app is deployed to. Unknown or missing values count as local.
 */
export function getEnvironment(): Environment {
  const result = EnvironmentSchema.safeParse(import.meta.env.VITE_ENVIRONMENT);
  return result.success ? result.data : 'local';
}

export function getSentryDsn(): string | null {
  return import.meta.env.VITE_SENTRY_DSN || null;
}
