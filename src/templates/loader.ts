/**
 * Template folder loading
 *
 * Reads every *.json file in the templates folder in file-name order
 * (numeric-aware, so "2-x.json" sorts before "10-x.json"). Sequence numbers
 * follow this order, so it must not depend on the platform's directory
 * listing order.
 *
 * A file that cannot be parsed becomes a failed entry; it does not stop the
 * other files from loading.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import type { PolicyConditions, PolicyUserConditions } from '../api/types.js';
import { MalformedTemplateError, TemplateFolderError } from '../errors.js';
import type { PolicyTemplate, TemplateEntry } from './types.js';

/** Supported file extension for template files */
const TEMPLATE_EXTENSION = '.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Compare template file names the way they are processed
 */
export function compareTemplateFileNames(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true, sensitivity: 'base' }) || (a < b ? -1 : a > b ? 1 : 0);
}

function readGroupList(
  users: Record<string, unknown>,
  key: 'includeGroups' | 'excludeGroups',
  fileName: string
): string[] | undefined {
  const value = users[key];
  if (value === undefined) return undefined;
  if (!isStringArray(value)) {
    throw new MalformedTemplateError(fileName, `conditions.users.${key} must be an array of strings`);
  }
  return [...value];
}

function readUsers(raw: Record<string, unknown>, fileName: string): PolicyUserConditions {
  const users: PolicyUserConditions = {};
  for (const [key, value] of Object.entries(raw)) {
    users[key] = value;
  }

  const includeGroups = readGroupList(raw, 'includeGroups', fileName);
  if (includeGroups) users.includeGroups = includeGroups;

  const excludeGroups = readGroupList(raw, 'excludeGroups', fileName);
  if (excludeGroups) users.excludeGroups = excludeGroups;

  return users;
}

function readConditions(raw: Record<string, unknown>, fileName: string): PolicyConditions {
  const conditions: PolicyConditions = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key !== 'users') conditions[key] = value;
  }

  const { users } = raw;
  if (users !== undefined && users !== null) {
    if (!isRecord(users)) {
      throw new MalformedTemplateError(fileName, 'conditions.users must be an object');
    }
    conditions.users = readUsers(users, fileName);
  }

  return conditions;
}

/**
 * Check the structure the engine relies on and build a typed template
 *
 * @throws MalformedTemplateError
 */
export function validateTemplate(raw: unknown, fileName: string): PolicyTemplate {
  if (!isRecord(raw)) {
    throw new MalformedTemplateError(fileName, 'template must be a JSON object');
  }

  const { displayName, conditions } = raw;
  if (typeof displayName !== 'string' || displayName.trim() === '') {
    throw new MalformedTemplateError(fileName, 'displayName must be a non-empty string');
  }

  const template: PolicyTemplate = { displayName };
  for (const [key, value] of Object.entries(raw)) {
    if (key !== 'displayName' && key !== 'conditions') template[key] = value;
  }

  if (conditions !== undefined && conditions !== null) {
    if (!isRecord(conditions)) {
      throw new MalformedTemplateError(fileName, 'conditions must be an object');
    }
    template.conditions = readConditions(conditions, fileName);
  }

  return template;
}

/**
 * Parse the text of one template file
 *
 * @throws MalformedTemplateError
 */
export function parseTemplate(content: string, fileName: string): PolicyTemplate {
  let raw: unknown;
  try {
    // Some exporters write a UTF-8 BOM
    raw = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new MalformedTemplateError(
      fileName,
      `invalid JSON (${err instanceof Error ? err.message : String(err)})`,
      err instanceof Error ? err : undefined
    );
  }
  return validateTemplate(raw, fileName);
}

/**
 * List template file names in processing order
 *
 * @throws TemplateFolderError if the folder is missing or not a directory
 */
export async function listTemplateFiles(folder: string): Promise<string[]> {
  const absolute = resolve(folder);
  try {
    const info = await stat(absolute);
    if (!info.isDirectory()) {
      throw new TemplateFolderError(absolute);
    }
  } catch (err) {
    if (err instanceof TemplateFolderError) throw err;
    throw new TemplateFolderError(absolute, err instanceof Error ? err : undefined);
  }

  const entries = await readdir(absolute, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === TEMPLATE_EXTENSION)
    .map((entry) => entry.name)
    .sort(compareTemplateFileNames);
}

/**
 * Load every template in the folder, in processing order
 *
 * @throws TemplateFolderError if the folder is missing or not a directory
 */
export async function loadTemplates(folder: string): Promise<TemplateEntry[]> {
  const absolute = resolve(folder);
  const fileNames = await listTemplateFiles(absolute);
  const entries: TemplateEntry[] = [];

  for (const fileName of fileNames) {
    const filePath = join(absolute, fileName);
    try {
      const content = await readFile(filePath, 'utf-8');
      entries.push({ ok: true, fileName, filePath, template: parseTemplate(content, fileName) });
    } catch (err) {
      const error =
        err instanceof MalformedTemplateError
          ? err
          : new MalformedTemplateError(
              fileName,
              `could not be read (${err instanceof Error ? err.message : String(err)})`,
              err instanceof Error ? err : undefined
            );
      entries.push({ ok: false, fileName, filePath, error });
    }
  }

  return entries;
}
