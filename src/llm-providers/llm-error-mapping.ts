import { isPlainObject } from '../utils.js';

export type LlmErrorKind =
  | 'rate_limit'
  | 'auth_error'
  | 'quota_exceeded'
  | 'model_error'
  | 'timeout'
  | 'network_error';

export const LLM_ERROR_KIND_MEANINGS: Record<LlmErrorKind, { summary: string }> = {
  rate_limit: { summary: 'Too many requests or provider overloaded.' },
  auth_error: { summary: 'Authentication or authorization failure.' },
  quota_exceeded: { summary: 'Quota or billing limit reached.' },
  model_error: { summary: 'Request rejected by the provider or model.' },
  timeout: { summary: 'Request timed out or was aborted.' },
  network_error: { summary: 'Network or transport failure.' },
};

const MESSAGE_KIND_PATTERNS: [LlmErrorKind, string[]][] = [
  ['rate_limit', ['rate limit', 'rate_limit', 'too many requests', 'overload']],
  ['auth_error', ['authentication', 'unauthorized', 'invalid api key', 'invalid x-api-key', 'forbidden']],
  ['quota_exceeded', ['quota', 'billing', 'credit balance', 'payment required']],
  ['model_error', ['model not found', 'unknown model', 'invalid model', 'invalid_request']],
  ['timeout', ['timeout', 'timed out', 'deadline exceeded', 'aborted']],
  ['network_error', ['network', 'connection', 'socket hang up', 'econnreset', 'econnrefused', 'enotfound', 'fetch failed']],
];

const STATUS_KIND_MAP = new Map<number, LlmErrorKind>([
  [429, 'rate_limit'],
  [529, 'rate_limit'],
  [401, 'auth_error'],
  [403, 'auth_error'],
  [402, 'quota_exceeded'],
  [400, 'model_error'],
  [404, 'model_error'],
  [408, 'timeout'],
]);

const NAME_KIND_MAP = new Map<string, LlmErrorKind>([
  ['aborterror', 'timeout'],
  ['timeouterror', 'timeout'],
  ['ai_nosuchmodelerror', 'model_error'],
  ['ai_loadapikeyerror', 'auth_error'],
]);

export const classifyLlmErrorKindFromMessage = (message: string | undefined): LlmErrorKind | undefined => {
  const normalized = typeof message === 'string' ? message.trim().toLowerCase() : '';
  if (normalized.length === 0) return undefined;
  const match = MESSAGE_KIND_PATTERNS.find(([, patterns]) => patterns.some((pattern) => normalized.includes(pattern)));
  return match?.[0];
};

/**
 * Best-effort classification of a provider failure, for logs and the CLI.
 * Reads `statusCode`/`status`, the error name and the message, in that order.
 */
export function classifyLlmError(error: unknown): LlmErrorKind | undefined {
  if (!isPlainObject(error) && !(error instanceof Error)) {
    return typeof error === 'string' ? classifyLlmErrorKindFromMessage(error) : undefined;
  }
  const fields: Record<string, unknown> = { ...error };
  const status = typeof fields.statusCode === 'number' ? fields.statusCode : fields.status;
  if (typeof status === 'number') {
    const byStatus = STATUS_KIND_MAP.get(status);
    if (byStatus !== undefined) return byStatus;
    if (status >= 500) return 'network_error';
  }
  const name = error instanceof Error ? error.name : fields.name;
  if (typeof name === 'string') {
    const byName = NAME_KIND_MAP.get(name.toLowerCase());
    if (byName !== undefined) return byName;
  }
  const message = error instanceof Error ? error.message : fields.message;
  return classifyLlmErrorKindFromMessage(typeof message === 'string' ? message : undefined);
}
