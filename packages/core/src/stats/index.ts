/**
 * Registry 통계 엔진
 * subject 병렬 분석 → 병합 → 랭킹
 */
export { analyzeSubject, firstSuccessful, emptySubjectResult } from './analyzer';
export type { AnalyzeOptions } from './analyzer';
export { analyzeSubjectsParallel, clampWorkerCount } from './scheduler';
export type { SchedulerOptions } from './scheduler';
export { aggregateResults, emptyRegistryStats, emptyStatsReport } from './aggregator';
export { summarizeErrors, StatsCollectionError } from './errors';
export type { ErrorSummary } from './errors';
export { collectRegistryStats, subjectUniverse } from './pipeline';
export type { CollectStatsOptions } from './pipeline';
