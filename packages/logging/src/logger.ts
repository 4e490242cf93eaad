import type {Writable} from 'node:stream';

import {z} from 'zod';

import {activeRequestScope} from './context';
import {createRedactor} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

type EntryLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

const LogEntrySchema = z
  .object({
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    protected_path: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

/**
 * One event written by the gate. `event` is a dotted name such as
 * `access.denied`; `component` names the module that wrote it.
 */
export type LogEntry = z.infer<typeof LogEntrySchema>;

export type StructuredLogger = Readonly<Record<EntryLevel, (entry: LogEntry) => void>>;

export type LogSink = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  sink?: LogSink;
  extraSensitiveKeys?: string[];
};

/**
 * JSON lines logger. `error` and `fatal` go to stderr, everything else to
 * stdout. Entries that fail validation are replaced by a `log.entry_invalid`
 * line on stderr.
 */
export const createStructuredLogger = ({
  service,
  env,
  level,
  now = () => new Date(),
  sink = {stdout: process.stdout, stderr: process.stderr},
  extraSensitiveKeys = []
}: StructuredLoggerOptions): StructuredLogger => {
  const threshold = LEVEL_RANK[LogLevelSchema.parse(level)];
  const redact = createRedactor(extraSensitiveKeys);

  const emit = (entryLevel: EntryLevel, rawEntry: LogEntry) => {
    if (LEVEL_RANK[entryLevel] < threshold) {
      return;
    }

    const parsed = LogEntrySchema.safeParse(rawEntry);
    if (!parsed.success) {
      const line = {
        ts: now().toISOString(),
        level: 'error',
        service,
        env,
        event: 'log.entry_invalid',
        component: 'logging',
        metadata: {issues: parsed.error.issues.map(issue => issue.message)}
      };
      sink.stderr.write(`${JSON.stringify(line)}\n`);
      return;
    }

    const entry = parsed.data;
    const scope = activeRequestScope();
    // Undefined fields drop out of the serialized line.
    const line = {
      ts: now().toISOString(),
      level: entryLevel,
      service,
      env,
      event: entry.event,
      component: entry.component,
      correlation_id: entry.correlation_id ?? scope?.correlation_id ?? 'n/a',
      request_id: entry.request_id ?? scope?.request_id ?? 'n/a',
      message: entry.message,
      protected_path: entry.protected_path,
      reason_code: entry.reason_code,
      duration_ms: entry.duration_ms,
      status_code: entry.status_code,
      route: entry.route ?? scope?.route,
      method: entry.method ?? scope?.method,
      metadata: redact(entry.metadata ?? {})
    };

    const stream = entryLevel === 'error' || entryLevel === 'fatal' ? sink.stderr : sink.stdout;
    stream.write(`${JSON.stringify(line)}\n`);
  };

  return {
    debug: entry => emit('debug', entry),
    info: entry => emit('info', entry),
    warn: entry => emit('warn', entry),
    error: entry => emit('error', entry),
    fatal: entry => emit('fatal', entry)
  };
};
