import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createLogger, errorMessage } from '@schemastat/shared';
import { createCliContext } from '../utils/registry-client';
import type { GlobalOptions } from '../utils/registry-client';
import { printInfo } from '../utils/output';

const log = createLogger('health');

/** 선택 항목 조회: 권한/버전에 따라 없을 수 있으므로 실패 시 undefined */
async function optional<T>(label: string, fetch: () => Promise<T>): Promise<T | undefined> {
  try {
    return await fetch();
  } catch (error) {
    log.debug({ check: label, err: errorMessage(error) }, 'optional health check skipped');
    return undefined;
  }
}

export function createHealthCommand(): Command {
  return new Command('health')
    .description('Check Schema Registry connectivity')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const spinner = ora('Checking connectivity...').start();

      try {
        const { connection, client } = createCliContext(globals);
        const subjects = await client.listSubjects(false);
        spinner.succeed(chalk.green('Connection successful'));
        printInfo(`Registry URL: ${connection.url}`);
        printInfo(`Subjects found: ${subjects.length}`);

        const mode = await optional('mode', () => client.getMode());
        if (mode) printInfo(`Mode: ${mode.mode}`);

        const compatibility = await optional('config', () => client.getConfig());
        const level = compatibility?.compatibilityLevel || compatibility?.compatibility;
        if (level) printInfo(`Compatibility: ${level}`);

        const contexts = await optional('contexts', () => client.getContexts());
        if (contexts) printInfo(`Contexts: ${contexts.length}`);

        console.log(chalk.green('✓ All health checks passed'));
      } catch (error) {
        spinner.fail(chalk.red('Health check failed'));
        console.error(errorMessage(error));
        process.exit(1);
      }
    });
}
