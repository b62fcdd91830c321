import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

/**
 * Environment accepted by the service. Unknown keys are dropped.
 */
export const powerOceanEnvSchema = z.object({
  ECOFLOW_SERIAL: z.string().min(1),
  ECOFLOW_USERNAME: z.string().min(1),
  ECOFLOW_PASSWORD: z.string().min(1),
  ECOFLOW_AUTH_URL: z
    .string()
    .url()
    .default('https://api.ecoflow.com/auth/login'),
  ECOFLOW_API_URL: z.string().url().default('https://api-e.ecoflow.com'),
  ECOFLOW_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  POWEROCEAN_POLL_INTERVAL_SECONDS: z.coerce.number().int().min(0).default(60),
  PORT: z.coerce.number().int().positive().default(3000),
});

export type PowerOceanEnv = z.infer<typeof powerOceanEnvSchema>;

/**
 * Typed settings consumed by the PowerOcean providers.
 */
export interface PowerOceanSettings {
  serial: string;
  username: string;
  password: string;
  authUrl: string;
  apiUrl: string;
  requestTimeoutMs: number;
  /** 0 disables background polling. */
  pollIntervalSeconds: number;
}

/**
 * `validate` hook for ConfigModule.forRoot().
 *
 * @throws Error listing every invalid or missing key
 */
export function validatePowerOceanEnv(
  config: Record<string, unknown>,
): PowerOceanEnv {
  const result = powerOceanEnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid PowerOcean configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Read and validate the PowerOcean settings from the ConfigService.
 */
export function readPowerOceanSettings(
  configService: ConfigService,
): PowerOceanSettings {
  const env = validatePowerOceanEnv({
    ECOFLOW_SERIAL: configService.get<unknown>('ECOFLOW_SERIAL'),
    ECOFLOW_USERNAME: configService.get<unknown>('ECOFLOW_USERNAME'),
    ECOFLOW_PASSWORD: configService.get<unknown>('ECOFLOW_PASSWORD'),
    ECOFLOW_AUTH_URL: configService.get<unknown>('ECOFLOW_AUTH_URL'),
    ECOFLOW_API_URL: configService.get<unknown>('ECOFLOW_API_URL'),
    ECOFLOW_REQUEST_TIMEOUT_MS: configService.get<unknown>(
      'ECOFLOW_REQUEST_TIMEOUT_MS',
    ),
    POWEROCEAN_POLL_INTERVAL_SECONDS: configService.get<unknown>(
      'POWEROCEAN_POLL_INTERVAL_SECONDS',
    ),
  });

  return {
    serial: env.ECOFLOW_SERIAL,
    username: env.ECOFLOW_USERNAME,
    password: env.ECOFLOW_PASSWORD,
    authUrl: env.ECOFLOW_AUTH_URL,
    apiUrl: env.ECOFLOW_API_URL.replace(/\/+$/, ''),
    requestTimeoutMs: env.ECOFLOW_REQUEST_TIMEOUT_MS,
    pollIntervalSeconds: env.POWEROCEAN_POLL_INTERVAL_SECONDS,
  };
}
