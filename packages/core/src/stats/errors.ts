import { ERROR_SUMMARY_FULL_LIMIT, ERROR_SUMMARY_HEAD } from '@schemastat/shared';
import type { SubjectError } from '@schemastat/shared';

/** 레지스트리 전체 subject 목록 조회 실패: 실행 전체 중단 */
export class StatsCollectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StatsCollectionError';
  }
}

export interface ErrorSummary {
  /** "<subject>: <detail>" */
  shown: string[];
  hidden: number;
}

/**
 * 에러 요약
 * 20개 이하면 전부, 초과하면 앞 10개 + 나머지 개수
 */
export function summarizeErrors(errors: readonly SubjectError[]): ErrorSummary {
  const lines = errors.map((e) => `${e.subject}: ${e.detail}`);
  if (lines.length <= ERROR_SUMMARY_FULL_LIMIT) {
    return { shown: lines, hidden: 0 };
  }
  return {
    shown: lines.slice(0, ERROR_SUMMARY_HEAD),
    hidden: lines.length - ERROR_SUMMARY_HEAD,
  };
}
