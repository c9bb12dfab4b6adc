/**
 * Registry 통계 수집 파이프라인
 *
 * 1. 활성 subject / 삭제 포함 subject 목록 조회 (실패 시 전체 중단)
 * 2. 두 목록 합집합으로 분석 대상 결정
 * 3. 워커 풀로 subject별 분석
 * 4. 결과 병합
 */
import { DEFAULT_STATS_WORKERS, createLogger, errorMessage, isInternalSubject } from '@schemastat/shared';
import type { ProgressListener, RetrievalPort, StatsReport } from '@schemastat/shared';
import { analyzeSubjectsParallel } from './scheduler';
import { aggregateResults, emptyStatsReport } from './aggregator';
import { StatsCollectionError } from './errors';

const log = createLogger('stats');

export interface CollectStatsOptions {
  workers?: number;
  /** 목록 조회 직후, 분석 대상 subject 수와 함께 호출 */
  onSubjects?: (total: number) => void;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

async function listAll(port: RetrievalPort, includeDeleted: boolean): Promise<string[]> {
  try {
    return await port.listSubjects(includeDeleted);
  } catch (error) {
    const which = includeDeleted ? 'all subjects (including deleted)' : 'active subjects';
    throw new StatsCollectionError(`failed to list ${which}: ${errorMessage(error)}`, { cause: error });
  }
}

/** 삭제 포함 목록 순서를 유지하고 활성 전용 이름을 뒤에 추가 */
export function subjectUniverse(allSubjects: readonly string[], activeSubjects: readonly string[]): string[] {
  return [...new Set([...allSubjects, ...activeSubjects])];
}

export async function collectRegistryStats(
  port: RetrievalPort,
  options: CollectStatsOptions = {},
): Promise<StatsReport> {
  const { workers = DEFAULT_STATS_WORKERS, onSubjects, onProgress, signal } = options;

  const activeSubjects = await listAll(port, false);
  const allSubjects = await listAll(port, true);
  const subjects = subjectUniverse(allSubjects, activeSubjects);

  onSubjects?.(subjects.length);

  // 빈 registry는 정상 종료 상태
  if (subjects.length === 0) {
    return emptyStatsReport();
  }

  // 내부 subject만 있으면 totalSubjects는 0, internal 카운트를 위해서만 분석
  if (!subjects.some((subject) => !isInternalSubject(subject))) {
    log.debug({ internal: subjects.length }, 'registry holds only internal subjects');
  }

  log.debug({ subjects: subjects.length, active: activeSubjects.length, workers }, 'analyzing subjects');

  const results = await analyzeSubjectsParallel(port, subjects, {
    workers,
    ...(onProgress ? { onProgress } : {}),
    ...(signal ? { signal } : {}),
  });

  return aggregateResults(results, activeSubjects);
}
