/**
 * Registry 통계 관련 타입 정의
 * core 파이프라인과 CLI 출력 양쪽에서 공유
 */

/** subject 하나를 분석한 중간 결과 */
export interface SubjectResult {
  subject: string;
  /** 이름 접두어로 한 번만 결정 */
  isInternal: boolean;
  /** 버전 목록 길이 (조회 실패한 버전 포함) */
  versionCount: number;
  totalSize: number;
  /** 0보다 큰 크기 중 최솟값, 없으면 null */
  minSize: number | null;
  maxSize: number | null;
  /** "<subject> (v<version>)" */
  largestVersion: string | null;
  schemaIds: number[];
  typeCounts: Record<string, number>;
  totalReferences: number;
  versionsWithReferences: number;
  errors: string[];
}

export interface SubjectVersionCount {
  subject: string;
  versions: number;
}

export interface SubjectSizeInfo {
  subject: string;
  totalSize: number;
  avgSize: number;
  versionCount: number;
}

/** 최종 통계 리포트 (내부 subject는 internal* 항목에만 집계) */
export interface RegistryStats {
  activeSubjects: number;
  deletedSubjects: number;
  totalSubjects: number;
  internalSubjects: number;

  activeVersions: number;
  deletedVersions: number;
  totalVersions: number;
  internalVersions: number;

  uniqueSchemaIds: number;
  minSchemaId: number;
  maxSchemaId: number;

  avroSchemas: number;
  protobufSchemas: number;
  jsonSchemas: number;

  totalSchemaSize: number;
  avgSchemaSize: number;
  minSchemaSize: number;
  maxSchemaSize: number;
  largestSchema: string;

  schemasWithRefs: number;
  totalReferences: number;

  topByVersions: SubjectVersionCount[];
  topBySize: SubjectSizeInfo[];
}

export interface SubjectError {
  subject: string;
  detail: string;
}

export interface StatsDiagnostics {
  errors: SubjectError[];
  subjectsWithErrors: number;
}

export interface StatsReport {
  stats: RegistryStats;
  diagnostics: StatsDiagnostics;
}

/** 진행 상황 콜백: completed는 1부터 total까지 단조 증가 */
export type ProgressListener = (completed: number, total: number, subject: string) => void;
