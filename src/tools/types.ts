import type { LogEntry, LogSeverity, ProviderKind, ToolDescriptor, ToolInvokeOptions } from '../types.js';

import { warn } from '../utils.js';

export type LogSink = (entry: LogEntry) => void;

/**
 * Capability surface shared by every provider client. The tool preparer only
 * talks to providers through this class, never through their concrete type.
 */
export abstract class ToolProvider {
  abstract readonly kind: ProviderKind;
  abstract readonly name: string;
  protected onLog?: LogSink;

  abstract listCallables(): Promise<ToolDescriptor[]>;
  abstract invoke(name: string, args: Record<string, unknown>, opts?: ToolInvokeOptions): Promise<string>;
  abstract close(): Promise<void>;
  // Optional warmup hook for providers that need async initialization (e.g., MCP)
  async warmup(): Promise<void> { /* default no-op */ }

  protected log(
    severity: LogSeverity,
    message: string,
    opts?: { remoteIdentifier?: string; fatal?: boolean; direction?: LogEntry['direction']; details?: LogEntry['details']; error?: unknown }
  ): void {
    // stack traces only travel with ERR entries
    const stack = severity === 'ERR' && opts?.error instanceof Error ? opts.error.stack : undefined;
    const entry: LogEntry = {
      timestamp: Date.now(),
      severity,
      direction: opts?.direction ?? 'response',
      type: 'tool',
      toolKind: this.kind,
      remoteIdentifier: opts?.remoteIdentifier ?? `${this.kind}:${this.name}`,
      fatal: opts?.fatal ?? false,
      message,
      details: opts?.details,
      ...(stack !== undefined ? { stack } : {}),
    };
    try { this.onLog?.(entry); } catch (e) { warn(`${this.kind} onLog failed: ${e instanceof Error ? e.message : String(e)}`); }
  }
}
