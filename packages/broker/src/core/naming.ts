/**
 * Topic id / version / handler name validation.
 *
 * Rules:
 * - topic ids: non-empty, no whitespace, no '@' (reserved for "id@version")
 * - versions: MAJOR.MINOR.PATCH with an optional pre-release suffix
 * - handler names and aliases: non-empty, no whitespace
 */

const WHITESPACE_RE = /\s/;
const SEMVER_RE = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

export type NameValidationResult =
  | { ok: true }
  | { ok: false; reason: string };

export function validateTopicId(id: unknown): NameValidationResult {
  if (typeof id !== 'string') return { ok: false, reason: 'not_a_string' };
  if (id.length === 0) return { ok: false, reason: 'empty' };
  if (WHITESPACE_RE.test(id)) return { ok: false, reason: 'contains_whitespace' };
  if (id.includes('@')) return { ok: false, reason: 'contains_version_separator' };
  return { ok: true };
}

export function validateVersion(version: unknown): NameValidationResult {
  if (typeof version !== 'string') return { ok: false, reason: 'not_a_string' };
  if (!SEMVER_RE.test(version)) return { ok: false, reason: `not_semver:${version}` };
  return { ok: true };
}

export function validateHandlerName(name: unknown): NameValidationResult {
  if (typeof name !== 'string') return { ok: false, reason: 'not_a_string' };
  if (name.length === 0) return { ok: false, reason: 'empty' };
  if (WHITESPACE_RE.test(name)) return { ok: false, reason: `contains_whitespace:${name}` };
  return { ok: true };
}

export function formatFullId(id: string, version: string): string {
  return `${id}@${version}`;
}
