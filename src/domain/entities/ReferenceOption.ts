/**
 * ReferenceOption - dropdown source values. Read-only for clerks; seeded at startup.
 */
export type ReferenceCategory = 'payer' | 'insurance' | 'clinician';

export const REFERENCE_CATEGORIES: readonly ReferenceCategory[] = ['payer', 'insurance', 'clinician'];

export interface ReferenceOption {
  key: string;
  category: ReferenceCategory;
  value: string;
}

export const REFERENCE_HEADERS = ['Key', 'Category', 'Value'] as const;

export const DEFAULT_REFERENCE_OPTIONS: Record<ReferenceCategory, readonly string[]> = {
  payer: ['Daman', 'NAS', 'NextCare', 'MedNet', 'Neuron', 'Cash'],
  insurance: ['Daman', 'ADNIC', 'AXA Gulf', 'Oman Insurance', 'Orient Insurance', 'Cash'],
  clinician: [],
};

export function isReferenceCategory(value: string): value is ReferenceCategory {
  return REFERENCE_CATEGORIES.some((category) => category === value);
}

export function referenceKey(category: ReferenceCategory, value: string): string {
  return `${category}:${value.trim().toLowerCase()}`;
}

export function createReferenceOption(category: ReferenceCategory, value: string): ReferenceOption {
  return { key: referenceKey(category, value), category, value: value.trim() };
}
