/**
 * Types for Conditional Access policy templates
 */

import type { PolicyPayload } from '../api/types.js';
import type { MalformedTemplateError } from '../errors.js';

/**
 * A parsed policy template. Same shape as a policy payload, but the display
 * name and group lists may still contain placeholder tokens.
 */
export type PolicyTemplate = PolicyPayload;

/**
 * One file from the templates folder
 */
export type TemplateEntry =
  | {
      ok: true;
      fileName: string;
      filePath: string;
      template: PolicyTemplate;
    }
  | {
      ok: false;
      fileName: string;
      filePath: string;
      error: MalformedTemplateError;
    };

/**
 * A successfully parsed template file
 */
export type LoadedTemplate = Extract<TemplateEntry, { ok: true }>;
