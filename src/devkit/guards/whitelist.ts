import fs from 'fs-extra';
import { ToolError } from '../errors.js';
import type { ManagerId } from '../types.js';

/** `null` means every package is allowed. */
export type AllowSet = ReadonlySet<string> | null;

const NPM_NAME = /^(?:@[a-z0-9][\w.-]*\/)?[a-z0-9][\w.-]*$/i;
/** Semver range or dist-tag. No `:` or `/`, so aliases, URLs and git refs fall out. */
const NPM_VERSION = /^[\w.^~<>=|* -]+$/;

const PYTHON_NAME = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?/;
const PYTHON_EXTRAS = /^\[\s*[A-Za-z0-9._-]+(?:\s*,\s*[A-Za-z0-9._-]+)*\s*\]/;
const PYTHON_CLAUSE = /(?:===|==|!=|~=|<=|>=|<|>)\s*[A-Za-z0-9.*+!_-]+/.source;
const PYTHON_VERSIONS = new RegExp(`^\\(?\\s*${PYTHON_CLAUSE}(?:\\s*,\\s*${PYTHON_CLAUSE})*\\s*\\)?`);

function npmName(spec: string): string | null {
  const versionAt = spec.indexOf('@', spec.startsWith('@') ? 1 : 0);
  const name = versionAt === -1 ? spec : spec.slice(0, versionAt);
  const version = versionAt === -1 ? null : spec.slice(versionAt + 1);
  if (!NPM_NAME.test(name)) return null;
  if (version !== null && !NPM_VERSION.test(version)) return null;
  return name;
}

/** name [extras] [version clauses] [; marker] */
function pythonName(spec: string): string | null {
  const name = PYTHON_NAME.exec(spec)?.[0];
  if (!name) return null;
  let rest = spec.slice(name.length).trimStart();
  rest = rest.replace(PYTHON_EXTRAS, '').trimStart();
  rest = rest.replace(PYTHON_VERSIONS, '').trimStart();
  return rest === '' || rest.startsWith(';') ? name : null;
}

/**
 * The registry name a package spec installs, with version, extras and
 * marker suffixes stripped:
 * `requests[socks]>=2.31; python_version>"3.8"` -> `requests`,
 * `@types/node@20.1.0` -> `@types/node`.
 * Returns null for anything that does not install a registry package by
 * that name: npm aliases (`x@npm:y`), URLs, git and file specs, and
 * direct references (`name @ https://...`).
 */
export function packageName(manager: ManagerId, spec: string): string | null {
  const trimmed = spec.trim();
  return manager === 'npm' ? npmName(trimmed) : pythonName(trimmed);
}

export function validatePackage(manager: ManagerId, spec: string, allowed: AllowSet): void {
  if (allowed === null) return;
  const name = packageName(manager, spec);
  if (name === null) {
    throw new ToolError('WhitelistViolation', `Package spec '${spec.trim()}' does not name a registry package and cannot be checked against the allowed packages list`);
  }
  if (!allowed.has(name)) {
    throw new ToolError('WhitelistViolation', `Package '${name}' is not in the allowed packages list`);
  }
}

/** Requirement lines with blanks and comments removed. */
export function parseRequirements(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.replace(/\s+#.*$/, '').trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Every entry must pass; a single disallowed line rejects the whole file.
 * Option lines (`-e`, `--index-url`, nested `-r`) name no package and are
 * refused while a whitelist is active.
 */
export async function validateRequirementsFile(manager: ManagerId, file: string, allowed: AllowSet): Promise<void> {
  if (allowed === null) return;
  const entries = parseRequirements(await fs.readFile(file, 'utf8'));
  for (const entry of entries) {
    if (entry.startsWith('-')) {
      throw new ToolError('WhitelistViolation', `Requirements option '${entry}' cannot be checked against the allowed packages list`);
    }
    // hashes pin an artifact of the same requirement
    validatePackage(manager, entry.replace(/\s+--hash[=\s]\S+/g, ''), allowed);
  }
}
