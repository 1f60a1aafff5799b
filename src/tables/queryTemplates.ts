import { z } from 'zod';

import { PriorityTier, QueryCandidate } from '../types.js';

import { deepFreeze, loadDataFile } from './dataFile.js';

const templateFileSchema = z.object({
  categories: z.record(
    z.string(),
    z.object({
      priority: z.enum(['HIGH', 'MEDIUM', 'LOW']),
      templates: z.array(z.string().includes('{keyword}'))
    })
  ),
  maps: z.array(z.string().includes('{keyword}'))
});

type TemplateLibrary = z.output<typeof templateFileSchema>;

export type TemplatePriority = 'high' | 'medium' | 'industry' | 'all';

const PRIORITY_FILTER: Record<Exclude<TemplatePriority, 'all'>, PriorityTier> = {
  high: 'HIGH',
  medium: 'MEDIUM',
  industry: 'LOW'
};

let library: TemplateLibrary | null = null;

function getLibrary(): TemplateLibrary {
  if (!library) {
    library = deepFreeze(loadDataFile('queries.json', templateFileSchema));
  }
  return library;
}

export interface QueryTemplate {
  category: string;
  priority: PriorityTier;
  template: string;
}

export function getQueryTemplates(priority: TemplatePriority = 'all'): QueryTemplate[] {
  const templates: QueryTemplate[] = [];
  for (const [category, entry] of Object.entries(getLibrary().categories)) {
    if (priority !== 'all' && entry.priority !== PRIORITY_FILTER[priority]) {
      continue;
    }
    for (const template of entry.templates) {
      templates.push({ category, priority: entry.priority, template });
    }
  }
  return templates;
}

export function getMapsTemplates(): readonly string[] {
  return getLibrary().maps;
}

export function expandTemplate(template: string, keyword: string): string {
  return template.split('{keyword}').join(keyword.trim()).replace(/\s+/g, ' ').trim();
}

export function toCandidate(template: QueryTemplate, keyword: string): QueryCandidate {
  return {
    text: expandTemplate(template.template, keyword),
    priority: template.priority,
    category: template.category,
    reasoning: `Template "${template.template}" for keyword "${keyword}"`,
    translations: {}
  };
}
