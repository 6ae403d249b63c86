import { z } from 'zod';
import fs from 'fs';
import { SEARCH_ENGINES } from './constants';

const EnvironmentSchema = z.object({
  // SearXNG backend
  SEARXNG_URL: z.string().url('SEARXNG_URL must be a valid URL').default('http://localhost:8080'),
  DEFAULT_ENGINE: z.enum(SEARCH_ENGINES).default('google'),

  // OpenAI-compatible completion API used for summaries (optional)
  OPENAI_API_URL: z
    .string()
    .url('OPENAI_API_URL must be a valid URL')
    .default('https://api.openai.com/v1'),
  OPENAI_API_TOKEN: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-3.5-turbo'),

  // Timeouts
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  PAGE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SUMMARY_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  SUMMARY_MAX_INPUT_CHARS: z.coerce.number().int().min(500).max(100000).default(8000),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    const env = EnvironmentSchema.parse(process.env);

    // A SearXNG container on the host is unreachable through localhost from inside Docker
    if (isRunningInDocker()) {
      env.SEARXNG_URL = fixDockerUrl(env.SEARXNG_URL);
    }

    env.SEARXNG_URL = env.SEARXNG_URL.replace(/\/+$/, '');
    env.OPENAI_API_URL = env.OPENAI_API_URL.replace(/\/+$/, '');

    cachedEnvironment = env;
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

export function isRunningInDocker(): boolean {
  if (fs.existsSync('/.dockerenv') || process.env.DOCKER_CONTAINER) {
    return true;
  }

  try {
    const cgroup = fs.readFileSync('/proc/1/cgroup', 'utf8');
    return cgroup.includes('docker') || cgroup.includes('containerd');
  } catch {
    // not on Linux or /proc unavailable
    return false;
  }
}

export function fixDockerUrl(url: string): string {
  return url.replace(/(127\.0\.0\.1|localhost)/gi, 'host.docker.internal');
}

export function validateEnvironment(): void {
  getEnvironment();
}

export function isSummarizationConfigured(): boolean {
  return Boolean(getEnvironment().OPENAI_API_TOKEN);
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
