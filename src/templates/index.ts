/**
 * Template loading exports
 */

export {
  loadTemplates,
  listTemplateFiles,
  parseTemplate,
  validateTemplate,
  compareTemplateFileNames,
} from './loader.js';

export type { PolicyTemplate, TemplateEntry, LoadedTemplate } from './types.js';
