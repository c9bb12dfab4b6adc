import type { OUTPUT_FORMATS } from '../constants/index';

// === 기본 유틸리티 타입 ===

/** 배열 타입에서 원소 타입 추출 */
export type ArrayElement<T extends readonly unknown[]> = T[number];

/** 출력 형식 유니온 */
export type OutputFormat = ArrayElement<typeof OUTPUT_FORMATS>;

// === Registry 엔티티 ===

/** 다른 스키마에 대한 참조 (개수만 통계에 사용) */
export interface SchemaReference {
  name: string;
  subject: string;
  version: number;
}

/** 특정 subject의 특정 버전 스키마 */
export interface SchemaRecord {
  subject: string;
  version: number;
  /** registry 전역 스키마 ID (여러 subject에서 중복 가능) */
  id: number;
  /** 원본 타입 태그: 비어 있으면 AVRO */
  schemaType: string;
  schema: string;
  references: SchemaReference[];
  deleted?: boolean;
}

/**
 * 통계 파이프라인이 소비하는 Registry 조회 포트
 * 모든 메서드는 not-found / transport 오류 시 reject
 */
export interface RetrievalPort {
  listSubjects(includeDeleted: boolean): Promise<string[]>;
  listVersions(subject: string, includeDeleted: boolean): Promise<number[]>;
  getSchema(subject: string, version: string): Promise<SchemaRecord>;
  getSchemaIncludingDeleted(
    subject: string,
    version: string,
    includeDeleted: boolean,
  ): Promise<SchemaRecord>;
}

export * from './stats';
