import { z } from 'zod';
import { ListError } from './errors.js';

export const DEFAULT_SITE_URL = 'https://sgi.cedia.org.ec';
export const DEFAULT_USERNAME = 'nintexinstall';
export const DEFAULT_LIST_TITLE = 'RA4-1 Solicitud para Viajes';
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Environment configuration schema with validation
 */
export const ConfigSchema = z.object({
  // SharePoint connection
  siteUrl: z
    .string()
    .url()
    .default(DEFAULT_SITE_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  username: z.string().default(DEFAULT_USERNAME),
  password: z.string().default(''),
  domain: z.string().default(''),
  workstation: z.string().default(''),
  listTitle: z.string().min(1).default(DEFAULT_LIST_TITLE),

  // Requests
  requestTimeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),

  // Output
  outputFile: z.string().optional(),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warning', 'error']).default('info'),

  // OpenTelemetry
  otelEnabled: z.boolean().default(false),
  otelEndpoint: z.string().optional(),
  otelServiceName: z.string().default('sp-list-export'),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

export type Env = Record<string, string | undefined>;

/**
 * Builds the configuration from environment variables. Called once at startup;
 * the result is passed to every component that needs it.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    siteUrl: env.SP_SITE_URL,
    username: env.SP_USERNAME,
    password: env.SP_PASSWORD,
    domain: env.SP_DOMAIN,
    workstation: env.SP_WORKSTATION,
    listTitle: env.SP_LIST_TITLE,
    requestTimeoutMs: env.SP_TIMEOUT_MS ? Number(env.SP_TIMEOUT_MS) : undefined,
    outputFile: env.SP_OUTPUT_FILE,
    logLevel: env.LOG_LEVEL,
    otelEnabled: env.OTEL_ENABLED === 'true',
    otelEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT,
    otelServiceName: env.OTEL_SERVICE_NAME,
  };

  // Filter out undefined and empty values so defaults apply
  const filteredConfig = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined && v !== '')
  );

  const parsed = ConfigSchema.safeParse(filteredConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ListError('CONFIG_ERROR', `Invalid configuration: ${issues}`, {
      cause: parsed.error,
    });
  }

  return Object.freeze(parsed.data);
}

/**
 * Human-readable problems worth a warning before any request is sent.
 * Credentials are otherwise left for the server to accept or reject.
 */
export function getConfigWarnings(config: Config): string[] {
  const warnings: string[] = [];

  if (!config.password) {
    warnings.push('SP_PASSWORD not set - the server will most likely reject the request');
  }
  if (config.otelEnabled && !config.otelEndpoint) {
    warnings.push('OTEL_ENABLED is true but OTEL_EXPORTER_OTLP_ENDPOINT is not set');
  }

  return warnings;
}
