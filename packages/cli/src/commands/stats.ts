/**
 * stats 커맨드: Schema Registry 전체 통계
 *
 * 모든 subject의 모든 버전을 워커 풀로 조회해
 * subject/버전 수, 스키마 ID, 타입 분포, 크기, 참조, Top 10 랭킹을 출력
 * 사용법: schemastat stats [-o json] [--detailed] [--workers 50]
 */
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { OUTPUT_FORMATS, errorMessage } from '@schemastat/shared';
import type { OutputFormat } from '@schemastat/shared';
import { collectRegistryStats, summarizeErrors } from '@schemastat/core';
import { resolveWorkerCount } from '@schemastat/config';
import { createCliContext } from '../utils/registry-client';
import type { GlobalOptions } from '../utils/registry-client';
import {
  buildStatsSections,
  internalNote,
  printEmptyRegistry,
  printErrorSummary,
  printHeader,
  printInfo,
  printSection,
} from '../utils/output';

interface StatsOptions {
  output?: string;
  detailed?: boolean;
  workers?: string;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show Schema Registry statistics')
    .option('-o, --output <format>', 'Output format (table | json)')
    .option('--detailed', 'Show top 10 subjects by version count and by size')
    .option('--workers <n>', 'Number of parallel workers for fetching schemas (default: 20)')
    .action(async (options: StatsOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions & StatsOptions>();
      const spinner = ora('Fetching subjects...').start();

      // Ctrl+C → 진행 중인 버전 조회가 끝나면 중단
      const controller = new AbortController();
      const onSigint = () => controller.abort(new Error('Interrupted'));
      process.once('SIGINT', onSigint);

      try {
        const { config, connection, client } = createCliContext(globals);
        const format = options.output ?? config.defaultOutput ?? 'table';
        if (!isOutputFormat(format)) {
          throw new Error(`Unknown output format: ${format} (expected ${OUTPUT_FORMATS.join(' | ')})`);
        }
        const workers = resolveWorkerCount(options.workers);

        const report = await collectRegistryStats(client, {
          workers,
          signal: controller.signal,
          onSubjects: (total) => {
            spinner.text = `Analyzing ${total} subjects with ${workers} workers...`;
          },
          onProgress: (completed, total, subject) => {
            spinner.text = `[${completed}/${total}] ${subject}`;
          },
        });

        const { stats, diagnostics } = report;
        const json = format === 'json';

        // 내부 subject만 있는 registry도 비어 있는 것으로 취급
        if (stats.totalSubjects === 0) {
          spinner.info(chalk.blue('Registry is empty'));
          printEmptyRegistry(stats, json);
          return;
        }

        spinner.succeed(
          chalk.green(
            `Analyzed ${stats.totalSubjects} subjects (${stats.activeSubjects} active, ` +
              `${stats.deletedSubjects} deleted) on ${connection.url}`,
          ),
        );

        printErrorSummary(
          summarizeErrors(diagnostics.errors),
          diagnostics.errors.length,
          diagnostics.subjectsWithErrors,
          json,
        );

        if (json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }

        printHeader('Schema Registry Statistics');
        const sections = buildStatsSections(stats, options.detailed ?? false);
        sections.forEach((section, index) => {
          printSection(section);
          // Subject 표 바로 아래에 내부 subject 제외 안내
          if (index === 0) printInfo(internalNote(stats));
        });
      } catch (error) {
        spinner.fail(chalk.red('Statistics collection failed'));
        console.error(errorMessage(error));
        process.exit(1);
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
