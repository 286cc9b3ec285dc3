import { isPlainObject } from '../utils.js';

export type TaskResult =
  | { state: 'completed'; text: string; source: 'artifact' | 'history' | 'status' | 'none' }
  | { state: 'failed'; text: string; status: Record<string, unknown> }
  | { state: 'incomplete'; status: Record<string, unknown> };

export const EMPTY_COMPLETION_TEXT = 'Task completed but no response found';

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

/**
 * Concatenate the `text` of every part whose `kind` is `text`.
 */
export function extractText(parts: unknown): string {
  return asArray(parts)
    .map((p) => (isPlainObject(p) && p.kind === 'text' && typeof p.text === 'string' ? p.text : ''))
    .join('');
}

function fromArtifacts(result: Record<string, unknown>): string | undefined {
  const first = asArray(result.artifacts)[0];
  if (!isPlainObject(first)) return undefined;
  const text = extractText(first.parts);
  return text.length > 0 ? text : undefined;
}

// Most recent agent message that carries text
function fromHistory(result: Record<string, unknown>): string | undefined {
  const history = asArray(result.history);
  for (let i = history.length - 1; i >= 0; i -= 1) {
    const msg = history[i];
    if (!isPlainObject(msg) || msg.role !== 'agent') continue;
    const text = extractText(msg.parts);
    if (text.length > 0) return text;
  }
  return undefined;
}

function fromStatusMessage(status: Record<string, unknown>): string | undefined {
  if (!isPlainObject(status.message)) return undefined;
  const text = extractText(status.message.parts);
  return text.length > 0 ? text : undefined;
}

/**
 * Turn the `result` member of a `message/send` response into a TaskResult.
 *
 * completed: first artifact, then agent history, then the message embedded in
 * the status; `source: 'none'` when none of them carries text.
 * failed: text of the status message, or the serialized status.
 * anything else: incomplete, with the raw status.
 */
export function parseTaskEnvelope(result: unknown): TaskResult {
  const body = isPlainObject(result) ? result : {};
  const status = isPlainObject(body.status) ? body.status : {};
  if (status.state === 'completed') {
    const artifactText = fromArtifacts(body);
    if (artifactText !== undefined) return { state: 'completed', text: artifactText, source: 'artifact' };
    const historyText = fromHistory(body);
    if (historyText !== undefined) return { state: 'completed', text: historyText, source: 'history' };
    const statusText = fromStatusMessage(status);
    if (statusText !== undefined) return { state: 'completed', text: statusText, source: 'status' };
    return { state: 'completed', text: '', source: 'none' };
  }
  if (status.state === 'failed') {
    return { state: 'failed', text: fromStatusMessage(status) ?? JSON.stringify(status), status };
  }
  return { state: 'incomplete', status };
}

export function renderTaskResult(result: TaskResult): string {
  switch (result.state) {
    case 'completed':
      return result.source === 'none' ? EMPTY_COMPLETION_TEXT : result.text;
    case 'failed':
      return `Task failed: ${result.text}`;
    case 'incomplete':
      return `Task did not complete. Status: ${JSON.stringify(result.status)}`;
  }
}
