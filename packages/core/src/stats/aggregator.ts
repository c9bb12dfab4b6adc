/**
 * Aggregator - subject별 중간 결과를 최종 통계 리포트로 병합
 *
 * 입력 순서(워커 완료 순)에 영향받지 않도록 subject 이름순으로 정렬 후 집계
 * 랭킹 동점은 subject 이름 오름차순
 */
import { TOP_SUBJECTS_LIMIT } from '@schemastat/shared';
import type {
  RegistryStats,
  StatsReport,
  SubjectError,
  SubjectResult,
  SubjectSizeInfo,
  SubjectVersionCount,
} from '@schemastat/shared';

export function emptyRegistryStats(): RegistryStats {
  return {
    activeSubjects: 0,
    deletedSubjects: 0,
    totalSubjects: 0,
    internalSubjects: 0,
    activeVersions: 0,
    deletedVersions: 0,
    totalVersions: 0,
    internalVersions: 0,
    uniqueSchemaIds: 0,
    minSchemaId: 0,
    maxSchemaId: 0,
    avroSchemas: 0,
    protobufSchemas: 0,
    jsonSchemas: 0,
    totalSchemaSize: 0,
    avgSchemaSize: 0,
    minSchemaSize: 0,
    maxSchemaSize: 0,
    largestSchema: '',
    schemasWithRefs: 0,
    totalReferences: 0,
    topByVersions: [],
    topBySize: [],
  };
}

export function emptyStatsReport(): StatsReport {
  return {
    stats: emptyRegistryStats(),
    diagnostics: { errors: [], subjectsWithErrors: 0 },
  };
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** 내림차순 + 이름 오름차순 동점 처리 후 상위 N개 */
function rankTop<T extends { subject: string }>(entries: T[], metric: (e: T) => number, limit: number): T[] {
  return [...entries]
    .sort((a, b) => metric(b) - metric(a) || byName(a.subject, b.subject))
    .slice(0, limit);
}

function averageSize(totalSize: number, versionCount: number): number {
  return versionCount > 0 ? Math.floor(totalSize / versionCount) : 0;
}

export function aggregateResults(
  results: readonly SubjectResult[],
  activeSubjectNames: Iterable<string>,
  limit: number = TOP_SUBJECTS_LIMIT,
): StatsReport {
  const stats = emptyRegistryStats();
  const activeNames = new Set(activeSubjectNames);
  const ordered = [...results].sort((a, b) => byName(a.subject, b.subject));

  const schemaIds = new Set<number>();
  const versionEntries: SubjectVersionCount[] = [];
  const sizeEntries: SubjectSizeInfo[] = [];
  const errors: SubjectError[] = [];
  let subjectsWithErrors = 0;

  let minId: number | null = null;
  let maxId: number | null = null;
  let minSize: number | null = null;
  let maxSize: number | null = null;

  for (const r of ordered) {
    // 1. 내부 subject는 internal 카운트에만 반영
    if (r.isInternal) {
      stats.internalSubjects++;
      stats.internalVersions += r.versionCount;
      continue;
    }

    // 2. 에러 수집 (진단 요약용)
    if (r.errors.length > 0) {
      subjectsWithErrors++;
      for (const detail of r.errors) {
        errors.push({ subject: r.subject, detail });
      }
    }

    stats.totalSubjects++;
    stats.totalVersions += r.versionCount;
    if (activeNames.has(r.subject)) {
      stats.activeSubjects++;
      stats.activeVersions += r.versionCount;
    }

    versionEntries.push({ subject: r.subject, versions: r.versionCount });
    sizeEntries.push({
      subject: r.subject,
      totalSize: r.totalSize,
      avgSize: averageSize(r.totalSize, r.versionCount),
      versionCount: r.versionCount,
    });

    // 3. 스키마 ID 범위/고유 개수
    for (const id of r.schemaIds) {
      schemaIds.add(id);
      if (minId === null || id < minId) minId = id;
      if (maxId === null || id > maxId) maxId = id;
    }

    stats.avroSchemas += r.typeCounts['AVRO'] ?? 0;
    stats.protobufSchemas += r.typeCounts['PROTOBUF'] ?? 0;
    stats.jsonSchemas += r.typeCounts['JSON'] ?? 0;

    stats.totalSchemaSize += r.totalSize;
    stats.totalReferences += r.totalReferences;
    stats.schemasWithRefs += r.versionsWithReferences;

    if (r.minSize !== null && r.minSize > 0 && (minSize === null || r.minSize < minSize)) {
      minSize = r.minSize;
    }
    if (r.maxSize !== null && r.maxSize > (maxSize ?? 0)) {
      maxSize = r.maxSize;
      stats.largestSchema = r.largestVersion ?? '';
    }
  }

  // 4. active/deleted 분할
  stats.deletedSubjects = stats.totalSubjects - stats.activeSubjects;
  stats.deletedVersions = stats.totalVersions - stats.activeVersions;

  stats.uniqueSchemaIds = schemaIds.size;
  stats.minSchemaId = minId ?? 0;
  stats.maxSchemaId = maxId ?? 0;
  stats.minSchemaSize = minSize ?? 0;
  stats.maxSchemaSize = maxSize ?? 0;

  // 5. 평균 (분모 0 보호)
  stats.avgSchemaSize = stats.totalVersions > 0 ? stats.totalSchemaSize / stats.totalVersions : 0;

  // 6. 랭킹
  stats.topByVersions = rankTop(versionEntries, (e) => e.versions, limit);
  stats.topBySize = rankTop(sizeEntries, (e) => e.totalSize, limit);

  return {
    stats,
    diagnostics: { errors, subjectsWithErrors },
  };
}
