import { LoggerService } from '@nestjs/common';
import { runContext } from '@/shared/run-context';

export type GateLogLevel = 'debug' | 'info' | 'warn' | 'error';

type EntryLevel = GateLogLevel | 'verbose' | 'fatal';

const SEVERITY: Record<EntryLevel, number> = {
  verbose: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

const GATE_LEVELS: readonly GateLogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Lenient LOG_LEVEL lookup for use before the environment is validated. */
export function resolveLogLevel(raw: string | undefined): GateLogLevel {
  const normalized = raw?.trim().toLowerCase();
  return GATE_LEVELS.find((level) => level === normalized) ?? 'info';
}

export class StructuredLogger implements LoggerService {
  constructor(private readonly minLevel: GateLogLevel = 'info') {}

  log(message: string, context?: string): void {
    this.write('info', message, context);
  }

  error(message: unknown, trace?: string, context?: string): void {
    const msg = message instanceof Error ? message.message : String(message);
    const stack = message instanceof Error ? message.stack : trace;
    this.write('error', msg, context, { trace: stack });
  }

  warn(message: string, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: string, context?: string): void {
    this.write('debug', message, context);
  }

  verbose(message: string, context?: string): void {
    this.write('verbose', message, context);
  }

  fatal(message: string, context?: string): void {
    this.write('fatal', message, context);
  }

  private write(
    level: EntryLevel,
    message: string,
    context?: string,
    extra?: Record<string, unknown>,
  ): void {
    if (SEVERITY[level] < SEVERITY[this.minLevel]) return;

    const store = runContext.getStore();
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      runId: store?.runId ?? 'no-run',
      iteration: store?.iteration,
      context: context ?? 'Application',
      message,
      ...extra,
    };
    process.stdout.write(JSON.stringify(entry) + '\n');
  }
}
