import type { LogLevel } from '@nestjs/common';
import type { LogLevelName } from './configuration';

const ORDER: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

const FLOOR: Record<LogLevelName, LogLevel> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

// Nest Logger는 "최소 레벨"이 아니라 허용 레벨 목록을 받음
export function nestLogLevels(level: LogLevelName): LogLevel[] {
  return ORDER.slice(ORDER.indexOf(FLOOR[level]));
}
