import { z } from 'zod';
import { CITATION_STYLES, type CitationStyle } from './citations/types.js';

export type TransportMode = 'stdio' | 'http' | 'both';

const numberFromEnv = (defaultValue: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(defaultValue);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PAPERDRAFT_SERVER_NAME: z.string().default('paperdraft-citations'),
  PAPERDRAFT_SERVER_VERSION: z.string().default('0.1.0'),
  PAPERDRAFT_TRANSPORT: z.enum(['stdio', 'http', 'both']).default('stdio'),
  PAPERDRAFT_HOST: z.string().default('127.0.0.1'),
  PAPERDRAFT_PORT: numberFromEnv(8000, 1, 65535),
  PAPERDRAFT_HEALTH_PATH: z.string().default('/health'),
  PAPERDRAFT_API_KEY: z.string().optional(),
  PAPERDRAFT_MAX_SESSIONS: numberFromEnv(100, 1, 10000),
  PAPERDRAFT_DEFAULT_CITATION_STYLE: z.enum(CITATION_STYLES).default('apa'),
  PAPERDRAFT_STATE_DIR: z.string().default('./output')
});

type ParsedEnv = z.infer<typeof envSchema>;

const normalizePath = (value: string): string => {
  const withPrefix = value.startsWith('/') ? value : `/${value}`;
  return withPrefix.length > 1 && withPrefix.endsWith('/')
    ? withPrefix.slice(0, -1)
    : withPrefix;
};

export interface AppConfig {
  nodeEnv: ParsedEnv['NODE_ENV'];
  logLevel: ParsedEnv['LOG_LEVEL'];
  serverName: string;
  serverVersion: string;
  transport: TransportMode;
  host: string;
  port: number;
  healthPath: string;
  apiKey?: string;
  maxSessions: number;
  defaultCitationStyle: CitationStyle;
  stateDir: string;
}

export const parseConfig = (overrides?: Partial<Record<keyof ParsedEnv, string | number>>): AppConfig => {
  const mergedEnv: Record<string, string | number | undefined> = {
    ...process.env,
    ...(overrides ?? {})
  };

  const env = envSchema.parse(mergedEnv);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    serverName: env.PAPERDRAFT_SERVER_NAME,
    serverVersion: env.PAPERDRAFT_SERVER_VERSION,
    transport: env.PAPERDRAFT_TRANSPORT,
    host: env.PAPERDRAFT_HOST,
    port: env.PAPERDRAFT_PORT,
    healthPath: normalizePath(env.PAPERDRAFT_HEALTH_PATH),
    apiKey: env.PAPERDRAFT_API_KEY && env.PAPERDRAFT_API_KEY.length > 0 ? env.PAPERDRAFT_API_KEY : undefined,
    maxSessions: env.PAPERDRAFT_MAX_SESSIONS,
    defaultCitationStyle: env.PAPERDRAFT_DEFAULT_CITATION_STYLE,
    stateDir: env.PAPERDRAFT_STATE_DIR
  };
};
