/**
 * Offline deployment preview
 *
 * Renders every template the way a deploy run would (names, match names,
 * exclusion groups, placeholder warnings) without touching the tenant.
 * Group ids are not known offline, so group names stand in for them.
 */

import type { PolicyPayload } from '../../api/types.js';
import type { MalformedTemplateError } from '../../errors.js';
import type { TemplateEntry } from '../../templates/types.js';
import type { SharedGroupNames } from './batch.js';
import { checkMatchName, deriveMatchName } from './lookup.js';
import { findPlaceholders, substituteTemplate } from './placeholders.js';
import type { OutcomeError, PlaceholderKind, SequenceGenerator, SubstitutionWarning } from './types.js';

export interface PlanEntry {
  fileName: string;
  sequence?: string;
  displayName?: string;
  matchName?: string;
  exclusionGroup?: string;
  placeholders: PlaceholderKind[];
  warnings: SubstitutionWarning[];
  /** Payload with group names in place of ids */
  payload?: PolicyPayload;
  error?: OutcomeError;
}

export interface PlanTemplatesOptions {
  sequence: SequenceGenerator;
  exclusionGroupPrefix: string;
  sharedGroups: SharedGroupNames;
}

function rejected(fileName: string, error: MalformedTemplateError): PlanEntry {
  return {
    fileName,
    placeholders: [],
    warnings: [],
    error: { code: error.code, message: error.message, details: error.details },
  };
}

/**
 * Preview a deploy run
 */
export function planTemplates(entries: TemplateEntry[], options: PlanTemplatesOptions): PlanEntry[] {
  return entries.map((entry): PlanEntry => {
    if (!entry.ok) return rejected(entry.fileName, entry.error);
    const nameError = checkMatchName(entry.template.displayName, entry.fileName);
    if (nameError) return rejected(entry.fileName, nameError);

    const sequence = options.sequence.next();
    const exclusionGroup = `${options.exclusionGroupPrefix}${sequence.prefixAndNumber}`;
    const { payload, warnings } = substituteTemplate(entry.template, sequence, {
      ...options.sharedGroups,
      exclusion: exclusionGroup,
    });

    return {
      fileName: entry.fileName,
      sequence: sequence.prefixAndNumber,
      displayName: payload.displayName,
      matchName: deriveMatchName(payload.displayName),
      exclusionGroup,
      placeholders: findPlaceholders(entry.template),
      warnings,
      payload,
    };
  });
}
