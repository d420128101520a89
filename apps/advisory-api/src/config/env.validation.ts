// Import zod for runtime type validation and schema definition
import { z } from 'zod';

/**
 * Environment variable schema using Zod for validation
 * Defines expected types, constraints, defaults and optionality for all env vars
 */
const envSchema = z.object({
  // Node environment (development, production, test)
  NODE_ENV: z.string().optional(),
  // HTTP server port (must be positive integer)
  PORT: z.coerce.number().int().positive().default(3000),

  // Minimum log level written by JsonLogger
  LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).optional(),

  // JWT verification (HS256 shared secret)
  JWT_SECRET: z.string().min(16),
  JWT_ISSUER: z.string().min(1).default('advisory-platform'),
  JWT_AUDIENCE: z.string().min(1).default('advisory-api'),

  // Optional JSON seed for the in-memory directory
  DIRECTORY_SEED_PATH: z.string().min(1).optional(),

  // Swagger UI toggle; enabled unless explicitly 'false' (case-insensitive)
  SWAGGER_ENABLED: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? true : v.trim().toLowerCase() !== 'false')),

  // Comma-separated list of allowed CORS origins
  CORS_ORIGINS: z
    .string()
    .optional()
    .transform((v) =>
      (v ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    )
});

// Export inferred TypeScript type from the schema
export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables at application startup
 * Ensures all required configuration is present and valid before the app runs
 * @param config - Raw environment variable object from process.env
 * @returns Validated and typed environment configuration
 * @throws Error naming the missing/invalid keys (values are never echoed)
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const result = envSchema.safeParse(config);
  if (result.success) return result.data;

  // Extract field names from validation errors
  const keys = Array.from(
    new Set(
      result.error.issues
        .map((issue) => issue.path[0])
        .filter((k): k is string => typeof k === 'string' && k.length > 0)
    )
  );

  const keyList = keys.length > 0 ? keys.join(', ') : 'unknown keys';
  throw new Error(
    `Invalid environment configuration. Missing/invalid: ${keyList}. ` +
      `Create apps/advisory-api/.env.local from apps/advisory-api/.env.example.`
  );
}
