import type { ContractType, NoticeTypeGroup } from '../../types.js';
import { UK_AWARD_FORMS, type UkFormTag } from '../xml/constants.js';

const TED_DOCUMENT_TYPES: ReadonlyMap<string, NoticeTypeGroup> = new Map([
  ['0', 'PIN'],
  ['3', 'CONTRACT_NOTICE'],
  ['O', 'CONTRACT_NOTICE'],
  ['V', 'CONTRACT_NOTICE'],
  ['7', 'CONTRACT_AWARD'],
  ['K', 'MODIFICATION'],
]);

/** Maps a TED `TD_DOCUMENT_TYPE` code to its notice group. */
export function classifyTedDocumentType(code: string | null | undefined): NoticeTypeGroup {
  if (code == null) {
    return 'OTHER';
  }
  return TED_DOCUMENT_TYPES.get(code.trim().toUpperCase()) ?? 'OTHER';
}

export function classifyUkNotice(formTag: UkFormTag, tags: readonly string[]): NoticeTypeGroup {
  if (UK_AWARD_FORMS.has(formTag) && tags.includes('award')) {
    return 'CONTRACT_AWARD';
  }
  if (tags.includes('planning')) {
    return 'PLANNING';
  }
  return 'OTHER';
}

// first rule with a matching tag wins
const RELEASE_TAG_RULES: ReadonlyArray<[NoticeTypeGroup, readonly string[]]> = [
  ['MODIFICATION', ['tenderAmendment', 'awardUpdate', 'contractAmendment']],
  ['CONTRACT_AWARD', ['award', 'contract']],
  ['CONTRACT_NOTICE', ['tender', 'tenderUpdate']],
  ['PLANNING', ['planning', 'planningUpdate']],
];

export function classifyReleaseTags(tags: readonly string[]): NoticeTypeGroup {
  for (const [group, probes] of RELEASE_TAG_RULES) {
    if (probes.some((probe) => tags.includes(probe))) {
      return group;
    }
  }
  return 'OTHER';
}

/*
 * Best-effort guess from free text such as "Works", "services" or "goods".
 * Order matters: "work" is checked before the others.
 */
const CONTRACT_TYPE_RULES: ReadonlyArray<[string, ContractType]> = [
  ['work', 'WORKS'],
  ['service', 'SERVICES'],
  ['supply', 'SUPPLIES'],
  ['good', 'SUPPLIES'],
];

export function inferContractType(category: string | null | undefined): ContractType | null {
  if (!category) {
    return null;
  }
  const lower = category.toLowerCase();
  return CONTRACT_TYPE_RULES.find(([probe]) => lower.includes(probe))?.[1] ?? null;
}
