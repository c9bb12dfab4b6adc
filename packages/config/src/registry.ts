import { readFileSync, existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { DEFAULT_STATS_WORKERS, OUTPUT_FORMATS } from '@schemastat/shared';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

const registryEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional(),
  context: z.string().optional(),
  default: z.boolean().optional(),
});

const configFileSchema = z.object({
  registries: z.array(registryEntrySchema).default([]),
  defaultOutput: z.enum(OUTPUT_FORMATS).optional(),
});

export type RegistryEntry = z.infer<typeof registryEntrySchema>;
export type AppConfig = z.infer<typeof configFileSchema>;

/** 접속에 필요한 최종 값 */
export interface RegistryConnection {
  url: string;
  username?: string;
  password?: string;
  context?: string;
}

/** CLI 전역 옵션에서 넘어오는 값 */
export interface ConnectionFlags {
  url?: string;
  username?: string;
  password?: string;
  registry?: string;
  context?: string;
}

export type Env = Record<string, string | undefined>;

/** 설정 파일 탐색 순서: ./schemastat.json → ~/.schemastat/config.json */
export function defaultConfigPaths(cwd: string = process.cwd(), home: string = os.homedir()): string[] {
  return [
    path.resolve(cwd, 'schemastat.json'),
    path.resolve(home, '.schemastat', 'config.json'),
  ];
}

export function parseConfig(raw: unknown, source = 'config'): AppConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new ConfigError(`Invalid config file ${source}: ${issues}`);
  }
  return parsed.data;
}

/**
 * 설정 파일 로드
 * 명시 경로가 없고 기본 경로에도 파일이 없으면 빈 설정 반환
 */
export function loadConfig(explicitPath?: string, candidates: string[] = defaultConfigPaths()): AppConfig {
  const filePath = explicitPath ? path.resolve(explicitPath) : candidates.find((p) => existsSync(p));
  if (!filePath) {
    return { registries: [] };
  }

  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
  }
  return parseConfig(raw, filePath);
}

export function findRegistry(config: AppConfig, name: string): RegistryEntry | undefined {
  return config.registries.find((r) => r.name === name);
}

/** default 표시된 registry, 없으면 첫 번째 */
export function getDefaultRegistry(config: AppConfig): RegistryEntry | undefined {
  return config.registries.find((r) => r.default) ?? config.registries[0];
}

/**
 * SCHEMA_REGISTRY_BASIC_AUTH_USER_INFO ("user:password") 분리
 * 첫 번째 콜론 기준, 콜론이 없으면 전체를 username으로 취급
 */
export function splitUserInfo(userInfo: string): { username: string; password?: string } {
  const idx = userInfo.indexOf(':');
  if (idx < 0) {
    return { username: userInfo };
  }
  return { username: userInfo.slice(0, idx), password: userInfo.slice(idx + 1) };
}

/**
 * 접속 정보 결정
 * 우선순위: --url > --registry > 설정 파일 기본 registry > 환경 변수
 * --username / --password / --context 플래그는 항상 덮어씀
 */
export function resolveRegistryConnection(
  flags: ConnectionFlags,
  config: AppConfig,
  env: Env = process.env,
): RegistryConnection {
  let base: RegistryConnection | undefined;

  if (flags.url) {
    base = { url: flags.url };
  } else if (flags.registry) {
    const entry = findRegistry(config, flags.registry);
    if (!entry) {
      throw new ConfigError(`registry '${flags.registry}' not found in config`);
    }
    base = { url: entry.url, username: entry.username, password: entry.password, context: entry.context };
  } else {
    const entry = getDefaultRegistry(config);
    if (entry) {
      base = { url: entry.url, username: entry.username, password: entry.password, context: entry.context };
    } else if (env.SCHEMA_REGISTRY_URL) {
      const userInfo = env.SCHEMA_REGISTRY_BASIC_AUTH_USER_INFO;
      base = { url: env.SCHEMA_REGISTRY_URL, ...(userInfo ? splitUserInfo(userInfo) : {}) };
    }
  }

  if (!base || !base.url) {
    throw new ConfigError(
      'no Schema Registry URL configured. Use --url flag, set SCHEMA_REGISTRY_URL env var, ' +
        'or configure a registry in ~/.schemastat/config.json',
    );
  }

  return {
    url: base.url,
    username: flags.username || base.username || undefined,
    password: flags.password || base.password || undefined,
    context: flags.context || base.context || undefined,
  };
}

/**
 * 워커 수 결정: --workers > SCHEMASTAT_WORKERS > 기본값
 * 정수로 해석되지 않거나 1 미만이면 ConfigError
 */
export function resolveWorkerCount(flag: string | undefined, env: Env = process.env): number {
  const raw = flag ?? env.SCHEMASTAT_WORKERS;
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_STATS_WORKERS;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Invalid worker count '${raw}': expected a positive integer`);
  }
  return value;
}
