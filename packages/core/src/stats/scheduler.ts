/**
 * Parallel Scheduler - 고정 크기 워커 풀로 subject 분석
 *
 * 큐 커서, 결과 배열, 진행 카운터는 await 사이의 동기 구간에서만 변경되므로
 * 이벤트 루프 단일 스레드 안에서 중복 처리나 누락 없이 공유됨
 */
import type { RetrievalPort, SubjectResult, ProgressListener } from '@schemastat/shared';
import { analyzeSubject } from './analyzer';

export interface SchedulerOptions {
  workers: number;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

/** 워커 수 보정: 정수, 최소 1 */
export function clampWorkerCount(workers: number): number {
  if (!Number.isFinite(workers)) return 1;
  return Math.max(1, Math.floor(workers));
}

/**
 * subject 목록을 병렬 분석
 * 결과 순서는 보장하지 않음 (완료 순)
 */
export async function analyzeSubjectsParallel(
  port: RetrievalPort,
  subjects: readonly string[],
  options: SchedulerOptions,
): Promise<SubjectResult[]> {
  const { onProgress, signal } = options;
  const workerCount = clampWorkerCount(options.workers);
  const total = subjects.length;

  // 미리 채워진 작업 큐 (단일 생산자, 다중 소비자)
  let cursor = 0;
  const next = (): string | undefined => (cursor < total ? subjects[cursor++] : undefined);

  const results: SubjectResult[] = [];
  let completed = 0;

  const worker = async (): Promise<void> => {
    for (;;) {
      signal?.throwIfAborted();
      const subject = next();
      if (subject === undefined) return;

      const result = await analyzeSubject(port, subject, signal ? { signal } : {});
      results.push(result);
      completed++;
      onProgress?.(completed, total, subject);
    }
  };

  // 남는 워커는 빈 큐를 보고 즉시 종료
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}
