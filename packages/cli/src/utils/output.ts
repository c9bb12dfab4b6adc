/**
 * 콘솔 출력 유틸리티
 * 표 렌더링은 색상 없이 문자열만 만들고, 색상은 출력 시점에만 적용
 */
import chalk from 'chalk';
import { formatBytes, formatPercent } from '@schemastat/shared';
import type { RegistryStats } from '@schemastat/shared';
import type { ErrorSummary } from '@schemastat/core';

export interface TableSection {
  title: string;
  headers: string[];
  rows: string[][];
}

/**
 * 왼쪽 정렬 표: 헤더, 구분선, 행 순서
 * 열 간격은 공백 2칸, 각 줄 끝 공백 제거
 */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)),
  );
  const line = (cells: string[]) =>
    widths.map((w, i) => (cells[i] ?? '').padEnd(w)).join('  ').trimEnd();

  return [line(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(line)];
}

export function internalNote(stats: RegistryStats): string {
  return `(Excluding ${stats.internalSubjects} internal subjects with ${stats.internalVersions} versions)`;
}

/** ID 범위: ID가 하나도 없으면 0 */
export function schemaIdRange(stats: RegistryStats): number {
  return stats.uniqueSchemaIds > 0 ? stats.maxSchemaId - stats.minSchemaId + 1 : 0;
}

/** 통계 리포트 → 출력용 표 섹션 목록 (detailed면 Top 10 포함) */
export function buildStatsSections(stats: RegistryStats, detailed: boolean): TableSection[] {
  const typeTotal = stats.avroSchemas + stats.protobufSchemas + stats.jsonSchemas;

  const sections: TableSection[] = [
    {
      title: 'Subject Statistics',
      headers: ['Metric', 'Active', 'Deleted', 'Total'],
      rows: [
        ['Subjects', String(stats.activeSubjects), String(stats.deletedSubjects), String(stats.totalSubjects)],
        ['Schema Versions', String(stats.activeVersions), String(stats.deletedVersions), String(stats.totalVersions)],
      ],
    },
    {
      title: 'Schema ID Statistics',
      headers: ['Metric', 'Value'],
      rows: [
        ['Unique Schema IDs', String(stats.uniqueSchemaIds)],
        ['Min Schema ID', String(stats.minSchemaId)],
        ['Max Schema ID', String(stats.maxSchemaId)],
        ['ID Range', String(schemaIdRange(stats))],
      ],
    },
    {
      title: 'Schema Type Distribution',
      headers: ['Type', 'Count', 'Percentage'],
      rows: [
        ['AVRO', String(stats.avroSchemas), formatPercent(stats.avroSchemas, typeTotal)],
        ['PROTOBUF', String(stats.protobufSchemas), formatPercent(stats.protobufSchemas, typeTotal)],
        ['JSON', String(stats.jsonSchemas), formatPercent(stats.jsonSchemas, typeTotal)],
      ],
    },
    {
      title: 'Size Metrics',
      headers: ['Metric', 'Value'],
      rows: [
        ['Total Schema Size', formatBytes(stats.totalSchemaSize)],
        ['Average Schema Size', formatBytes(stats.avgSchemaSize)],
        ['Min Schema Size', formatBytes(stats.minSchemaSize)],
        ['Max Schema Size', formatBytes(stats.maxSchemaSize)],
        ['Largest Schema', stats.largestSchema],
      ],
    },
    {
      title: 'Reference Statistics',
      headers: ['Metric', 'Value'],
      rows: [
        ['Schema Versions with References', String(stats.schemasWithRefs)],
        ['Total References', String(stats.totalReferences)],
      ],
    },
  ];

  if (detailed) {
    sections.push(
      {
        title: `Top ${stats.topByVersions.length} Subjects by Version Count`,
        headers: ['Subject', 'Versions'],
        rows: stats.topByVersions.map((s) => [s.subject, String(s.versions)]),
      },
      {
        title: `Top ${stats.topBySize.length} Subjects by Total Size`,
        headers: ['Subject', 'Total Size', 'Avg Size', 'Versions'],
        rows: stats.topBySize.map((s) => [
          s.subject,
          formatBytes(s.totalSize),
          formatBytes(s.avgSize),
          String(s.versionCount),
        ]),
      },
    );
  }

  return sections;
}

export function printHeader(title: string): void {
  console.log('');
  console.log(chalk.bold(title));
  console.log('─'.repeat(50));
}

export function printSection(section: TableSection): void {
  console.log('');
  console.log(chalk.cyan(section.title));
  for (const line of renderTable(section.headers, section.rows)) {
    console.log(`  ${line}`);
  }
}

export function printInfo(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

/** 사용자 subject가 없는 registry: JSON 모드면 통계 문서, 아니면 내부 subject 안내만 */
export function printEmptyRegistry(stats: RegistryStats, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }
  if (stats.internalSubjects > 0) {
    printInfo(internalNote(stats));
  }
}

/** 에러 요약 출력 (stdout을 JSON 전용으로 쓸 때는 stderr) */
export function printErrorSummary(
  summary: ErrorSummary,
  total: number,
  subjectsWithErrors: number,
  toStderr = false,
): void {
  if (total === 0) return;
  const write = toStderr ? console.error : console.log;
  write(chalk.yellow(`⚠ Encountered ${total} errors across ${subjectsWithErrors} subjects`));
  for (const line of summary.shown) {
    write(chalk.red(`  ✗ ${line}`));
  }
  if (summary.hidden > 0) {
    write(chalk.dim(`  ... and ${summary.hidden} more errors`));
  }
}
