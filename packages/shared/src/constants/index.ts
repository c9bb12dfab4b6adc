// 내부(시스템) subject 접두어: ksqlDB가 자동 생성하는 subject
export const INTERNAL_SUBJECT_PREFIX = '_confluent-ksql-';

// 빈 스키마 타입 태그는 AVRO로 정규화
export const DEFAULT_SCHEMA_TYPE = 'AVRO';

// 통계 수집 기본 워커 수
export const DEFAULT_STATS_WORKERS = 20;

// Top-N 랭킹 크기
export const TOP_SUBJECTS_LIMIT = 10;

// 에러 요약: 이 개수 이하면 전부 출력, 초과하면 앞부분만 출력
export const ERROR_SUMMARY_FULL_LIMIT = 20;
export const ERROR_SUMMARY_HEAD = 10;

// 출력 형식
export const OUTPUT_FORMATS = ['table', 'json'] as const;

// Schema Registry REST 미디어 타입
export const REGISTRY_CONTENT_TYPE = 'application/vnd.schemaregistry.v1+json';

// 기본 컨텍스트 (접두 경로 없음)
export const DEFAULT_CONTEXT = '.';
