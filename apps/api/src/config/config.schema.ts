import { Logger } from '@nestjs/common';
import { z } from 'zod';

export const CLASSIFIER_PROVIDERS = ['gemini', 'openai', 'anthropic'] as const;
export type ClassifierProviderName = (typeof CLASSIFIER_PROVIDERS)[number];

const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

// Config validation schema using Zod
export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),

  // Vision classifier
  CLASSIFIER_PROVIDER: z.enum(CLASSIFIER_PROVIDERS).default('gemini'),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  GEMINI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  OPENAI_API_KEY: optionalSecret,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  ANTHROPIC_API_KEY: optionalSecret,
  ANTHROPIC_MODEL: z.string().min(1).default('claude-3-5-sonnet-latest'),

  // USDA FoodData Central
  USDA_API_KEY: z.string().trim().min(1, 'USDA_API_KEY is required'),
  USDA_BASE_URL: z.string().url().default('https://api.nal.usda.gov/fdc/v1'),
  USDA_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // Uploads
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export type AppConfig = z.infer<typeof configSchema>;

const PROVIDER_KEYS: Record<ClassifierProviderName, 'GEMINI_API_KEY' | 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'> = {
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const SECRET_KEYS = ['GEMINI_API_KEY', 'OPENAI_API_KEY', 'ANTHROPIC_API_KEY', 'USDA_API_KEY'] as const;

const logger = new Logger('Config');

/**
 * Validates environment configuration.
 * Throws if required variables are missing or invalid, which aborts startup.
 */
export function validateConfig(env: Record<string, unknown>): AppConfig {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    logger.error('Invalid configuration:');
    result.error.issues.forEach((issue) => {
      logger.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    });
    throw new Error('Configuration validation failed');
  }

  const config = result.data;

  const keyName = PROVIDER_KEYS[config.CLASSIFIER_PROVIDER];
  if (!config[keyName]) {
    throw new Error(`${keyName} is required when CLASSIFIER_PROVIDER=${config.CLASSIFIER_PROVIDER}`);
  }

  if (config.NODE_ENV === 'development') {
    logConfig(config);
  }

  return config;
}

export function maskSecrets(config: AppConfig): Record<string, string | number> {
  const sanitized: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(config)) {
    if (value === undefined) continue;
    sanitized[key] = value;
  }
  SECRET_KEYS.forEach((key) => {
    if (sanitized[key]) {
      sanitized[key] = '***';
    }
  });
  return sanitized;
}

function logConfig(config: AppConfig) {
  logger.log(`Configuration validated: ${JSON.stringify(maskSecrets(config))}`);
}
