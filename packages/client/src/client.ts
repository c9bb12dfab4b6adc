/**
 * Schema Registry REST 클라이언트
 * 통계 파이프라인의 RetrievalPort 구현 + health 체크용 조회
 */
import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  REGISTRY_CONTENT_TYPE,
  DEFAULT_CONTEXT,
  createLogger,
  errorMessage,
} from '@schemastat/shared';
import type { RetrievalPort, SchemaRecord } from '@schemastat/shared';
import { RegistryRequestError } from './errors';

const log = createLogger('client');

const DEFAULT_TIMEOUT_MS = 30_000;

export interface SchemaRegistryClientOptions {
  baseUrl: string;
  username?: string;
  password?: string;
  /** 비어 있거나 "." 이면 기본 컨텍스트 */
  context?: string;
  timeoutMs?: number;
  /** 테스트 등에서 전송 계층 교체용 */
  adapter?: AxiosAdapter;
}

// === 응답 스키마 ===

const subjectsSchema = z.array(z.string());
const versionsSchema = z.array(z.number().int());

const referenceSchema = z.object({
  name: z.string(),
  subject: z.string(),
  version: z.number().int(),
});

const schemaResponseSchema = z.object({
  subject: z.string().optional(),
  version: z.number().int().optional(),
  id: z.number().int(),
  schemaType: z.string().optional(),
  schema: z.string(),
  references: z.array(referenceSchema).optional(),
  deleted: z.boolean().optional(),
});

const modeSchema = z.object({ mode: z.string() });

const compatibilitySchema = z.object({
  compatibilityLevel: z.string().optional(),
  compatibility: z.string().optional(),
});

export type RegistryMode = z.infer<typeof modeSchema>;
export type CompatibilityConfig = z.infer<typeof compatibilitySchema>;

export class SchemaRegistryClient implements RetrievalPort {
  readonly baseUrl: string;
  readonly context: string;
  private readonly options: SchemaRegistryClientOptions;
  private readonly http: AxiosInstance;

  constructor(options: SchemaRegistryClientOptions) {
    this.options = options;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.context = options.context ?? '';
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        'Content-Type': REGISTRY_CONTENT_TYPE,
        Accept: REGISTRY_CONTENT_TYPE,
        'Confluent-Accept-Unknown-Properties': 'true',
      },
      ...(options.username
        ? { auth: { username: options.username, password: options.password ?? '' } }
        : {}),
      ...(options.adapter ? { adapter: options.adapter } : {}),
      responseType: 'text',
      // 상태 코드는 직접 판정
      validateStatus: () => true,
    });
  }

  /** 다른 컨텍스트를 바라보는 복사본 */
  withContext(context: string): SchemaRegistryClient {
    return new SchemaRegistryClient({ ...this.options, context });
  }

  /** 컨텍스트가 지정되면 /contexts/{ctx} 접두 경로 사용 */
  buildPath(path: string): string {
    if (this.context && this.context !== DEFAULT_CONTEXT) {
      return `/contexts/${encodeURIComponent(this.context)}${path}`;
    }
    return path;
  }

  async listSubjects(includeDeleted: boolean): Promise<string[]> {
    const path = this.buildPath('/subjects') + (includeDeleted ? '?deleted=true' : '');
    return this.request(path, 'get subjects', subjectsSchema);
  }

  async listVersions(subject: string, includeDeleted: boolean): Promise<number[]> {
    const path =
      this.buildPath(`/subjects/${encodeURIComponent(subject)}/versions`) +
      (includeDeleted ? '?deleted=true' : '');
    return this.request(path, 'get versions', versionsSchema);
  }

  async getSchema(subject: string, version: string): Promise<SchemaRecord> {
    return this.getSchemaIncludingDeleted(subject, version, false);
  }

  async getSchemaIncludingDeleted(
    subject: string,
    version: string,
    includeDeleted: boolean,
  ): Promise<SchemaRecord> {
    const path =
      this.buildPath(`/subjects/${encodeURIComponent(subject)}/versions/${encodeURIComponent(version)}`) +
      (includeDeleted ? '?deleted=true' : '');
    const body = await this.request(path, 'get schema', schemaResponseSchema);
    const parsedVersion = Number.parseInt(version, 10);

    return {
      subject: body.subject ?? subject,
      version: body.version ?? (Number.isNaN(parsedVersion) ? 0 : parsedVersion),
      id: body.id,
      schemaType: body.schemaType ?? '',
      schema: body.schema,
      references: body.references ?? [],
      ...(body.deleted !== undefined ? { deleted: body.deleted } : {}),
    };
  }

  async getMode(): Promise<RegistryMode> {
    return this.request(this.buildPath('/mode'), 'get mode', modeSchema);
  }

  async getConfig(): Promise<CompatibilityConfig> {
    return this.request(this.buildPath('/config'), 'get config', compatibilitySchema);
  }

  /** 컨텍스트 목록은 항상 루트 경로에서 조회 */
  async getContexts(): Promise<string[]> {
    return this.request('/contexts', 'get contexts', subjectsSchema);
  }

  private async request<T>(path: string, action: string, schema: z.ZodType<T>): Promise<T> {
    let status: number;
    let data: unknown;
    try {
      const res = await this.http.get<unknown>(path);
      status = res.status;
      data = res.data;
    } catch (error) {
      log.debug({ path, err: errorMessage(error) }, 'registry request failed');
      throw new RegistryRequestError(`request failed: ${errorMessage(error)}`, path, { cause: error });
    }

    const text = typeof data === 'string' ? data : JSON.stringify(data ?? '');

    if (status !== 200) {
      throw new RegistryRequestError(`failed to ${action}: ${text.trim()} (status ${status})`, path, {
        status,
      });
    }

    let json: unknown;
    try {
      json = typeof data === 'string' ? JSON.parse(data) : data;
    } catch (error) {
      throw new RegistryRequestError(`failed to parse ${action} response`, path, { status, cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new RegistryRequestError(`failed to parse ${action} response`, path, {
        status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
