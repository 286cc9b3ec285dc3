import type { LogEntry, LogSeverity } from '../types.js';
import type { LogSink } from '../tools/types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent, type BuildStructuredEventOptions } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  // Entries below this severity are dropped; TRC is only written when asked for
  minSeverity?: LogSeverity;
  logfmtWriter?: (line: string) => void;
  jsonWriter?: (line: string) => void;
  consoleWriter?: (line: string) => void;
}

const SEVERITY_RANK: Record<LogSeverity, number> = {
  TRC: 0,
  VRB: 1,
  WRN: 2,
  ERR: 3,
};

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sink: (event: StructuredLogEvent) => void;
  private readonly minRank: number;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.minRank = SEVERITY_RANK[options.minSeverity ?? 'VRB'];
    const color = options.color ?? false;
    const format = options.format ?? 'logfmt';
    if (format === 'json') {
      const writer = options.jsonWriter ?? defaultWriter;
      this.sink = (event) => { writer(`${JSON.stringify(buildJsonPayload(event))}\n`); };
    } else if (format === 'console') {
      const writer = options.consoleWriter ?? defaultWriter;
      this.sink = (event) => { writer(`${formatConsole(event, { color })}\n`); };
    } else {
      const writer = options.logfmtWriter ?? defaultWriter;
      this.sink = (event) => { writer(`${formatLogfmt(event, { color })}\n`); };
    }
  }

  emit(entry: LogEntry): void {
    if (SEVERITY_RANK[entry.severity] < this.minRank) return;
    const options: BuildStructuredEventOptions = { labels: this.labels };
    this.sink(buildStructuredLogEvent(entry, options));
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions = {}): StructuredLogger {
  return new StructuredLogger(options);
}

// Adapter for the `onLog` option of providers and the preparer
export function createLogSink(logger: StructuredLogger): LogSink {
  return (entry) => { logger.emit(entry); };
}

function defaultWriter(line: string): void {
  process.stderr.write(line);
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('fatal', event.fatal);
  push('tool_kind', event.toolKind);
  push('remote', event.remoteIdentifier);
  push('provider', event.provider);
  push('tool', event.tool);
  push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
