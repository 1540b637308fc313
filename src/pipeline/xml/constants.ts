/**
 * Form elements that mark a UK-dialect notice, probed newest first.
 * New forms are appended at the position matching their age; the first hit wins.
 */
export const UK_FORM_TAGS = [
  'UK16_2023',
  'UK15_2023',
  'UK14_2023',
  'UK13_2023',
  'UK12_2023',
  'UK11_2023',
  'UK10_2023',
  'UK9_2023',
  'UK8_2023',
  'UK7_2023',
  'UK6_2023',
  'UK5_2023',
  'UK4_2023',
  'UK3_2023',
  'UK2_2023',
  'UK1_2023',
  'UK1_2022',
] as const;

export type UkFormTag = (typeof UK_FORM_TAGS)[number];

/** Forms whose `award` tag marks a contract award. */
export const UK_AWARD_FORMS: ReadonlySet<UkFormTag> = new Set<UkFormTag>(['UK6_2023', 'UK7_2023']);

/** NUTS sub-schema namespaces, newest first. */
export const NUTS_NAMESPACES = [
  'http://enotice.service.gov.uk/resource/schema/ted/2021/nuts',
  'http://enotice.service.gov.uk/resource/schema/ted/2016/nuts',
] as const;

export const TED_SCHEMA_TYPE = 'TED_R2.0.9';

export function isUkFormTag(value: string): value is UkFormTag {
  return UK_FORM_TAGS.some((tag) => tag === value);
}
