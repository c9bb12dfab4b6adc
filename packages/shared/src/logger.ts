import pino from 'pino';

const LOG_LEVELS: ReadonlySet<string> = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

function resolveLevel(raw: string | undefined): string {
  const level = (raw ?? '').trim().toLowerCase();
  return LOG_LEVELS.has(level) ? level : 'warn';
}

/**
 * 진단 로그용 pino 루트 로거
 * stdout은 리포트 출력(JSON 포함)에 쓰이므로 stderr(fd 2)로만 기록
 */
export const logger = pino(
  {
    name: 'schemastat',
    level: resolveLevel(process.env.LOG_LEVEL),
  },
  pino.destination(2),
);

/**
 * 모듈별 child 로거
 */
export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
