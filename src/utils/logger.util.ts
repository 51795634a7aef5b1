/**
 * CLI 使用的最小日志接口：封装 console，按级别过滤。
 * 级别由环境变量 DESCJSON_LOG_LEVEL 决定（debug / info / warn / error，默认 info）。
 * 库代码（codec / compiler / runtime）不打日志。
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parse_log_level(raw: string | undefined): LogLevel {
  const v = (raw ?? '').trim().toLowerCase();
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : 'info';
}

/** sink 默认是 console；测试时可注入 */
export function create_logger(
  level: LogLevel = parse_log_level(process.env.DESCJSON_LOG_LEVEL),
  sink: Pick<Console, LogLevel> = console
): Logger {
  const emit = (lv: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[lv] < LEVEL_ORDER[level]) return;
    if (meta) sink[lv](message, meta);
    else sink[lv](message);
  };
  return {
    debug: (m, meta) => emit('debug', m, meta),
    info: (m, meta) => emit('info', m, meta),
    warn: (m, meta) => emit('warn', m, meta),
    error: (m, meta) => emit('error', m, meta),
  };
}

export const logger: Logger = create_logger();
