/**
 * 전역 옵션 + 설정 파일 + 환경 변수로 Registry 클라이언트 생성
 */
import { loadConfig, resolveRegistryConnection } from '@schemastat/config';
import type { AppConfig, ConnectionFlags, Env, RegistryConnection } from '@schemastat/config';
import { SchemaRegistryClient } from '@schemastat/client';

/** program 레벨 옵션 (모든 커맨드 공통) */
export interface GlobalOptions extends ConnectionFlags {
  config?: string;
}

export interface CliContext {
  config: AppConfig;
  connection: RegistryConnection;
  client: SchemaRegistryClient;
}

export function createCliContext(globals: GlobalOptions, env: Env = process.env): CliContext {
  const config = loadConfig(globals.config);
  const connection = resolveRegistryConnection(globals, config, env);
  const client = new SchemaRegistryClient({
    baseUrl: connection.url,
    ...(connection.username ? { username: connection.username } : {}),
    ...(connection.password ? { password: connection.password } : {}),
    ...(connection.context ? { context: connection.context } : {}),
  });
  return { config, connection, client };
}
