import { INTERNAL_SUBJECT_PREFIX, DEFAULT_SCHEMA_TYPE } from '../constants/index';

/**
 * 내부(시스템) subject 여부
 * 접두어가 이름 맨 앞에 있을 때만 내부로 분류
 */
export function isInternalSubject(subject: string): boolean {
  return subject.startsWith(INTERNAL_SUBJECT_PREFIX);
}

/**
 * 스키마 타입 태그 정규화 (빈 값 → AVRO, 나머지는 대문자)
 */
export function normalizeSchemaType(schemaType: string | undefined | null): string {
  const normalized = (schemaType ?? '').trim().toUpperCase();
  return normalized === '' ? DEFAULT_SCHEMA_TYPE : normalized;
}

/** 스키마 본문의 UTF-8 바이트 길이 */
export function schemaByteLength(schema: string): number {
  return Buffer.byteLength(schema, 'utf8');
}

/** 버전 식별 문자열: "<subject> (v<version>)" */
export function describeVersion(subject: string, version: number): string {
  return `${subject} (v${version})`;
}

/**
 * 바이트 수를 사람이 읽기 쉬운 단위로 변환 (1024 기준)
 * 예: 512 → "512 B", 1536 → "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  const unit = 1024;
  const value = Math.trunc(bytes);
  if (value < unit) {
    return `${value} B`;
  }
  let div = unit;
  let exp = 0;
  for (let n = Math.trunc(value / unit); n >= unit && exp < 5; n = Math.trunc(n / unit)) {
    div *= unit;
    exp++;
  }
  return `${(value / div).toFixed(1)} ${'KMGTPE'.charAt(exp)}B`;
}

/**
 * 비율(%) 문자열: 분모가 0이면 0.0%
 */
export function formatPercent(count: number, total: number): string {
  if (total <= 0) return '0.0%';
  return `${((count / total) * 100).toFixed(1)}%`;
}

/** unknown 오류 값을 메시지 문자열로 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
