#!/usr/bin/env -S npx tsx
/**
 * schemastat CLI 메인 진입점
 * Commander.js 기반 CLI 구성
 */
import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import path from 'path';
import { createStatsCommand } from './commands/stats';
import { createHealthCommand } from './commands/health';

// .env.local → .env 순서로 환경 변수 로드 (먼저 읽은 값 우선)
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const program = new Command();

program
  .name('schemastat')
  .description(
    chalk.bold('schemastat') +
      ': Schema Registry statistics\n' +
      chalk.dim('Counts subjects, versions, schema types, sizes and references.'),
  )
  .version('0.1.0', '-v, --version', 'Print version')
  .option('-u, --url <url>', 'Schema Registry URL (overrides config)')
  .option('--username <user>', 'Basic auth username')
  .option('--password <password>', 'Basic auth password')
  .option('-r, --registry <name>', 'Registry name from config')
  .option('-c, --context <context>', "Schema Registry context (e.g. '.mycontext')")
  .option('--config <path>', 'Config file (default: ./schemastat.json, ~/.schemastat/config.json)');

// 커맨드 등록
program.addCommand(createStatsCommand());
program.addCommand(createHealthCommand());

// 알 수 없는 커맨드 처리
program.on('command:*', (operands: string[]) => {
  console.error(chalk.red(`Unknown command: ${operands.join(' ')}`));
  console.log(chalk.dim('Run schemastat --help for usage.'));
  process.exit(1);
});

// 커맨드 없이 실행 시 help 출력
if (process.argv.length <= 2) {
  program.help();
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
