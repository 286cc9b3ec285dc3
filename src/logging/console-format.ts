import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_BOLD_RED = '\u001B[1;31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_DIM = '\u001B[2m';

const SEVERITY_COLOR: Record<StructuredLogEvent['severity'], string> = {
  ERR: ANSI_BOLD_RED,
  WRN: ANSI_YELLOW,
  VRB: ANSI_DIM,
  TRC: ANSI_DIM,
};

/**
 * Human-oriented single line: `HH:MM:SS.mmm SEV remote message`.
 * ERR lines are followed by the indented stack when one is attached.
 */
export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const time = event.isoTimestamp.slice(11, 23);
  const marker = event.fatal ? `${event.severity}!` : event.severity;
  const severity = options.color === true ? `${SEVERITY_COLOR[event.severity]}${marker}${ANSI_RESET}` : marker;
  let output = `${time} ${severity} ${event.remoteIdentifier} ${event.message}`;

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
