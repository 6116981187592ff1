import type { UseType } from '@/types/rules';

export type UseClass = 'single_family' | 'multi_family' | 'other_residential' | 'non_residential';

/** Category order for pickers; unknown categories go last, alphabetically */
export const PREFERRED_CATEGORY_ORDER = [
  'Residencial',
  'Comercial',
  'Serviço',
  'Saúde/Educação',
  'Institucional',
  'Industrial',
  'Misto',
  'Sistema',
] as const;

const FALLBACK_CATEGORY = 'Sistema';

function normalizeLabel(label: string): string {
  return label
    .normalize('NFD')
    .replace(/[̀-ͯ]/g, '')
    .trim()
    .toLowerCase();
}

/**
 * Use codes are free-form in the rule store ("RES_UNI", "res_unifamiliar",
 * "RES_MF"...), so classification goes by pattern. The label is a fallback
 * for codes that say nothing.
 */
export function classifyUse(useCode: string, label?: string): UseClass {
  const code = useCode.trim().toUpperCase();
  const text = label ? normalizeLabel(label) : '';

  if (code.startsWith('RES') && (code.includes('UNI') || code.includes('UNIF'))) return 'single_family';
  if (code.startsWith('RES') && (code.includes('MULTI') || code.includes('MF'))) return 'multi_family';
  if (text.includes('unifamiliar')) return 'single_family';
  if (text.includes('multifamiliar') || text.includes('predio')) return 'multi_family';
  if (code.startsWith('RES') || code.includes('RESIDEN')) return 'other_residential';
  return 'non_residential';
}

export function isSingleFamily(useCode: string, label?: string): boolean {
  return classifyUse(useCode, label) === 'single_family';
}

export function isMultiFamily(useCode: string, label?: string): boolean {
  return classifyUse(useCode, label) === 'multi_family';
}

export function isResidential(useCode: string, label?: string): boolean {
  return classifyUse(useCode, label) !== 'non_residential';
}

function categoryRank(category: string): number {
  const index = PREFERRED_CATEGORY_ORDER.findIndex((c) => c === category);
  return index === -1 ? PREFERRED_CATEGORY_ORDER.length : index;
}

export interface UseCategoryGroup {
  category: string;
  uses: UseType[];
}

/**
 * Group active uses by category in picker order. Inside "Residencial",
 * single-family comes first, then multi-family, then the rest by label.
 */
export function groupUseTypesByCategory(useTypes: UseType[]): UseCategoryGroup[] {
  const groups = new Map<string, UseType[]>();
  for (const use of useTypes) {
    const category = use.category ?? FALLBACK_CATEGORY;
    const list = groups.get(category) ?? [];
    list.push(use);
    groups.set(category, list);
  }

  const residentialRank = (use: UseType): number => {
    const cls = classifyUse(use.code, use.label);
    if (cls === 'single_family') return 0;
    if (cls === 'multi_family') return 1;
    return 2;
  };

  return [...groups.entries()]
    .sort(([a], [b]) => categoryRank(a) - categoryRank(b) || a.localeCompare(b, 'pt-BR'))
    .map(([category, uses]) => ({
      category,
      uses: [...uses].sort((a, b) => {
        if (category === 'Residencial') {
          const diff = residentialRank(a) - residentialRank(b);
          if (diff !== 0) return diff;
        }
        return a.label.localeCompare(b.label, 'pt-BR');
      }),
    }));
}
