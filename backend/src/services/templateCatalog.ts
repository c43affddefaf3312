import { TemplateNotFoundError } from '../domain/errors.js';
import { CvDocument, DesignConfig, Template, ThemeName } from '../domain/types.js';
import { loadTemplateDefinitions } from '../storage/catalogStore.js';
import { createEmptyDocument } from './documentModel.js';

export const THEMES: ThemeName[] = ['classic', 'moderncv', 'sb2nov', 'engineeringresumes'];
export const COLORS = ['blue', 'green', 'red', 'purple', 'orange'];
export const LANGUAGES = ['english', 'spanish', 'french', 'german', 'portuguese'];

let cachedTemplates: Template[] | null = null;

export function listTemplates(): Template[] {
  if (!cachedTemplates) {
    cachedTemplates = loadTemplateDefinitions();
  }
  return cachedTemplates;
}

export function getTemplate(templateId: string): Template | undefined {
  return listTemplates().find((template) => template.id === templateId);
}

export interface TemplateInstance {
  template: Template;
  design: DesignConfig;
  cv: CvDocument;
}

/**
 * Starts over from a template: the design becomes the template's defaults and
 * the document is a fresh one. Nothing from the previous state is kept. The
 * template's guided fields are the identity fields a form asks for first.
 */
export function instantiateTemplate(templateId: string): TemplateInstance {
  const template = getTemplate(templateId);
  if (!template) {
    throw new TemplateNotFoundError(templateId);
  }

  return {
    template,
    design: structuredClone(template.design),
    cv: createEmptyDocument(),
  };
}
