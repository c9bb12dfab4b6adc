/**
 * Subject Analyzer - subject 하나의 모든 버전을 조회해 중간 결과 생성
 *
 * I/O 실패는 reject하지 않고 errors에 기록
 * 조회 실패한 버전은 versionCount에만 포함되고 크기/타입/참조 집계에서 제외
 */
import {
  isInternalSubject,
  normalizeSchemaType,
  schemaByteLength,
  describeVersion,
  errorMessage,
  createLogger,
} from '@schemastat/shared';
import type { RetrievalPort, SchemaRecord, SubjectResult } from '@schemastat/shared';

const log = createLogger('analyzer');

export interface AnalyzeOptions {
  /** 버전 루프 매 회차 시작 시 확인 */
  signal?: AbortSignal;
}

type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; errors: string[] };

/**
 * 순서대로 시도해 첫 성공 값을 반환, 전부 실패하면 실패 메시지 목록
 */
export async function firstSuccessful<T>(attempts: Array<() => Promise<T>>): Promise<AttemptOutcome<T>> {
  const errors: string[] = [];
  for (const attempt of attempts) {
    try {
      return { ok: true, value: await attempt() };
    } catch (error) {
      errors.push(errorMessage(error));
    }
  }
  return { ok: false, errors };
}

export function emptySubjectResult(subject: string): SubjectResult {
  return {
    subject,
    isInternal: isInternalSubject(subject),
    versionCount: 0,
    totalSize: 0,
    minSize: null,
    maxSize: null,
    largestVersion: null,
    schemaIds: [],
    typeCounts: {},
    totalReferences: 0,
    versionsWithReferences: 0,
    errors: [],
  };
}

/** 조회 성공한 버전 하나를 결과에 반영 */
function recordSchema(result: SubjectResult, version: number, schema: SchemaRecord): void {
  const schemaType = normalizeSchemaType(schema.schemaType);
  result.typeCounts[schemaType] = (result.typeCounts[schemaType] ?? 0) + 1;

  result.schemaIds.push(schema.id);

  const size = schemaByteLength(schema.schema);
  result.totalSize += size;

  // 비정상적인 빈 본문이 최솟값을 0으로 만들지 않도록 양수만 반영
  if (size > 0 && (result.minSize === null || size < result.minSize)) {
    result.minSize = size;
  }
  // 0바이트 본문은 최대 크기/가장 큰 스키마로 기록하지 않음
  if (size > (result.maxSize ?? 0)) {
    result.maxSize = size;
    result.largestVersion = describeVersion(result.subject, version);
  }

  const refCount = schema.references.length;
  if (refCount > 0) {
    result.totalReferences += refCount;
    result.versionsWithReferences++;
  }
}

export async function analyzeSubject(
  port: RetrievalPort,
  subject: string,
  options: AnalyzeOptions = {},
): Promise<SubjectResult> {
  const { signal } = options;
  // 1. 내부 subject 분류 (네트워크 호출 전)
  const result = emptySubjectResult(subject);

  // 2. soft-delete 포함 버전 목록
  let versions: number[];
  try {
    versions = await port.listVersions(subject, true);
  } catch (error) {
    result.errors.push(`listVersions: ${errorMessage(error)}`);
    return result;
  }

  // 3. 버전 수는 조회 성공 여부와 무관
  result.versionCount = versions.length;

  // 4. 모든 버전 조회: 일반 조회 실패 시 deleted=true로 한 번 더
  for (const version of versions) {
    signal?.throwIfAborted();

    const ref = String(version);
    const outcome = await firstSuccessful<SchemaRecord>([
      () => port.getSchema(subject, ref),
      () => port.getSchemaIncludingDeleted(subject, ref, true),
    ]);

    if (!outcome.ok) {
      log.debug({ subject, version, errors: outcome.errors }, 'schema fetch failed');
      result.errors.push(`getSchema v${version}: ${outcome.errors.join('; ')}`);
      continue;
    }

    // 5. 타입/ID/크기/참조 집계
    recordSchema(result, version, outcome.value);
  }

  return result;
}
