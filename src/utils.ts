const TOOL_NAME_INVALID_CHARS = /[^A-Za-z0-9_-]/g;

/**
 * Map a provider-supplied tool or skill identifier onto `[A-Za-z0-9_-]`.
 * Every other character becomes `_`; the length is preserved.
 */
export const sanitizeToolName = (raw: string): string => raw.replace(TOOL_NAME_INVALID_CHARS, '_');

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const errorMessage = (value: unknown): string => (value instanceof Error ? value.message : String(value));

export const delay = (ms: number): Promise<void> => new Promise((resolve) => {
  if (ms <= 0) {
    resolve();
    return;
  }
  setTimeout(resolve, ms);
});

export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)\}/g, (_m: string, name: string) => (env[name] ?? ''));
}

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Warnings go to the installed sink; without one they are dropped
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch (e) {
    process.stderr.write(`warning sink failed: ${errorMessage(e)}; original warning: ${message}\n`);
  }
}
