import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  direction: LogEntry['direction'];
  fatal: boolean;
  toolKind?: string;
  remoteIdentifier: string;
  provider?: string;
  tool?: string;
  labels: Record<string, string>;
  stack?: string;
}

// syslog priorities
const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'severity',
  'type',
  'direction',
  'fatal',
  'remote',
  'tool_kind',
  'provider',
  'tool',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

/**
 * `mcp:<provider>`, `a2a:<provider>:<skill>`, `preparer:<provider>`.
 * Tool names may themselves contain ':'.
 */
export function parseRemoteIdentifier(identifier: string): { provider?: string; tool?: string } {
  const parts = identifier.split(':');
  if (parts.length < 2) return {};
  const provider = parts[1];
  const tool = parts.length > 2 ? parts.slice(2).join(':') : undefined;
  return { provider: provider.length > 0 ? provider : undefined, tool };
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const { provider, tool } = parseRemoteIdentifier(entry.remoteIdentifier);

  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0) labels[key] = value;
  });
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      if (Object.prototype.hasOwnProperty.call(labels, key)) return;
      if (typeof value === 'string') {
        if (value.length > 0) labels[key] = value;
        return;
      }
      if (typeof value === 'number') {
        if (Number.isFinite(value)) labels[key] = String(value);
        return;
      }
      labels[key] = value ? 'true' : 'false';
    });
  }

  const filteredLabels = Object.entries(labels).reduce<Record<string, string>>((acc, [key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return acc;
    acc[key] = value;
    return acc;
  }, {});

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    direction: entry.direction,
    fatal: entry.fatal,
    toolKind: entry.toolKind,
    remoteIdentifier: entry.remoteIdentifier,
    provider,
    tool,
    labels: filteredLabels,
    stack: entry.stack,
  };
}
