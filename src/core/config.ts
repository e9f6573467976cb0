import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

// Load environment variables
loadDotenv();

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  LOG_DIR: z.string().optional().default('./logs'),
  DOWNLOAD_DIR: z.string().default('./downloads'),
  YTDLP_PATH: z.string().optional().default('yt-dlp'),
  FFMPEG_PATH: z.string().optional().default('ffmpeg'),
  CACHE_TTL_SECONDS: z.coerce.number().positive().optional().default(3600),
  AUDIO_CODEC: z.enum(['mp3', 'm4a', 'opus', 'flac', 'wav']).optional().default('mp3'),
  AUDIO_QUALITY: z.coerce.number().int().positive().optional().default(192),
  // Optional: two-letter country code passed to yt-dlp for geo-bypass (e.g. US, NL)
  GEO_BYPASS_COUNTRY: z
    .string()
    .optional()
    .default('')
    .transform((value) => value.trim().toUpperCase())
    .refine((value) => value === '' || /^[A-Z]{2}$/.test(value), 'Expected a two-letter country code'),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`));
  }
  return result.data;
}

let appConfig: Config;

try {
  appConfig = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error('Configuration validation failed:');
    error.issues.forEach((issue) => {
      console.error(`  ${issue}`);
    });
    process.exit(1);
  }
  throw error;
}

export { appConfig as config };
