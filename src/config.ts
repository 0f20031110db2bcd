import { z } from 'zod';
import { ConfigError } from './errors.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform(value => value || undefined);

export const ConfigSchema = z.object({
  OPENAI_API_KEY: z.string({ required_error: 'OPENAI_API_KEY is not set' }).trim().min(1, 'OPENAI_API_KEY is empty'),
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  SONG_STORE_DIR: z.string().trim().min(1).default('.songs'),
  PORT: positiveInt(4321),
  AUTH_TOKEN: optionalText,
  RATE_LIMIT_RPM: positiveInt(6),
});

export interface AppConfig {
  openai: { apiKey: string; model: string };
  songStoreDir: string;
  port: number;
  authToken: string | undefined;
  rateLimitRpm: number;
}

/** Read once at an entry point. The pipeline itself never touches the environment. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const c = parsed.data;
  return {
    openai: { apiKey: c.OPENAI_API_KEY, model: c.OPENAI_MODEL },
    songStoreDir: c.SONG_STORE_DIR,
    port: c.PORT,
    authToken: c.AUTH_TOKEN,
    rateLimitRpm: c.RATE_LIMIT_RPM,
  };
}
