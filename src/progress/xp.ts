/**
 * XP aggregation over Notion pages.
 * Missing or unexpected property shapes count as zero; nothing here throws.
 */

import type { NotionPage, NotionPropertyValue } from '@/providers/notion/types';

function finiteOrZero(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function extractNumericValue(property: NotionPropertyValue | undefined): number {
  if (!property || typeof property !== 'object') return 0;

  if (property.type === 'number' && 'number' in property) {
    return finiteOrZero(property.number);
  }

  if (property.type === 'formula' && 'formula' in property) {
    const formula = property.formula;
    if (typeof formula !== 'object' || formula === null || !('number' in formula)) {
      return 0;
    }
    return finiteOrZero(formula.number);
  }

  return 0;
}

export function sumNumericProperty(records: readonly NotionPage[], propertyName: string): number {
  let total = 0;
  for (const record of records) {
    if (typeof record !== 'object' || record === null) continue;
    const properties = record.properties;
    if (typeof properties !== 'object' || properties === null) continue;
    total += extractNumericValue(properties[propertyName]);
  }
  return total;
}
