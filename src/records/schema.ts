import type { FieldValue } from '../types.js';

/** Column order of a normalized OCDS release. */
export const RELEASE_COLUMNS = [
  // bookkeeping
  'source_file',
  'row_index',
  'status',

  // identification
  'uri',
  'publishedDate',
  'ocid',
  'release_id',
  'release_title',
  'release_date',
  'release_language',
  'release_tag',
  'release_tags_all',
  'notice_type_group',
  'initiationType',

  // planning
  'planning_milestone_ids',
  'planning_milestone_titles',
  'planning_milestone_types',
  'planning_milestone_dueDates',
  'planning_document_ids',
  'planning_document_types',
  'planning_document_descriptions',
  'planning_document_urls',
  'planning_document_datePublished',
  'planning_document_formats',
  'planning_document_languages',

  // publisher / meta
  'publisher_name',
  'publisher_scheme',
  'publisher_uid',
  'publisher_uri',
  'version',
  'extensions',
  'license',
  'publicationPolicy',

  // tender
  'tender_id',
  'tender_title',
  'tender_description',
  'tender_status',
  'mainProcurementCategory',

  // value
  'value_amount',
  'value_currency',
  'minValue_amount',
  'minValue_currency',

  // CPV
  'cpv_scheme',
  'cpv_id',
  'cpv_description',
  'additional_cpv_ids',
  'additional_cpv_descriptions',

  // tender documents
  'tender_document_ids',
  'tender_document_types',
  'tender_document_descriptions',
  'tender_document_urls',
  'tender_document_datePublished',
  'tender_document_dateModified',
  'tender_document_formats',
  'tender_document_languages',

  // geography
  'tender_item_ids',
  'tender_delivery_postalCodes_all',
  'tender_delivery_regions_all',
  'tender_delivery_countryNames_all',
  'delivery_postalCode',
  'delivery_region',
  'delivery_country',

  // timing
  'tender_datePublished',
  'tender_endDate',
  'contract_startDate',
  'contract_endDate',

  // method / SME flags
  'procurementMethod',
  'procurementMethodDetails',
  'suitability_sme',
  'suitability_vcse',

  // buyer
  'buyer_id',
  'buyer_name',
  'buyer_legalName',
  'buyer_identifier_scheme',
  'buyer_identifier_id',
  'buyer_streetAddress',
  'buyer_locality',
  'buyer_postalCode',
  'buyer_countryName',
  'buyer_contact_name',
  'buyer_contact_email',
  'buyer_contact_telephone',
  'buyer_details_url',
  'buyer_roles',

  // suppliers
  'supplier_party_ids',
  'supplier_party_names',
  'supplier_legalNames',
  'supplier_identifier_schemes',
  'supplier_identifier_ids',
  'supplier_streetAddresses',
  'supplier_localities',
  'supplier_postalCodes',
  'supplier_countryNames',
  'supplier_scales',
  'supplier_vcse_flags',
  'supplier_details_urls',
  'supplier_roles',

  // links
  'tender_notice_url',
  'tender_notice_description',

  // first award
  'award_id',
  'award_status',
  'award_date',
  'award_datePublished',
  'award_value_amount',
  'award_value_currency',
  'award_contract_startDate',
  'award_contract_endDate',
  'award_suppliers_ids',
  'award_suppliers_names',
  'award_notice_url',
  'award_notice_description',
  'award_notice_datePublished',
  'award_notice_format',
  'award_notice_language',
  'award_document_ids',
  'award_document_types',
  'award_document_descriptions',
  'award_document_urls',
  'award_document_datePublished',
  'award_document_dateModified',
  'award_document_formats',
  'award_document_languages',
] as const;

/** Column order of a normalized Find a Tender XML notice. */
export const NOTICE_COLUMNS = [
  'schema_type',
  'form_type',
  'td_document_type_code',
  'notice_type_group',

  'doc_id',
  'edition',
  'no_doc_ojs',
  'notice_url',

  'date_pub',
  'ds_date_dispatch',
  'award_date',

  'iso_country',
  'ti_country',
  'ti_town',
  'ca_country_code',
  'ca_town',
  'ca_postcode',
  'ca_nuts_code',
  'perf_nuts_code',
  'ca_ce_nuts_code',

  'ca_name',
  'ca_email',
  'ca_url',

  'original_cpv_code',
  'cpv_main_code',
  'additional_cpv_codes',

  'ti_text',
  'obj_title',
  'short_descr',
  'type_contract_ctype',

  'val_total',
  'val_total_currency',
  'est_total_val',
  'est_total_val_currency',
  'proc_total_val',
  'proc_total_val_currency',
  'aw_val_total',
  'aw_val_currency',
  'nb_tenders',

  'nc_contract_nature_code',
  'pr_proc_code',
  'ac_award_crit_code',
  'ma_main_activities_code',
  'rp_regulation_code',

  'contractor_names',

  'parse_error',
  'source_xml_file',
  'source_archive',
] as const;

export type ReleaseColumn = (typeof RELEASE_COLUMNS)[number];
export type NoticeColumn = (typeof NOTICE_COLUMNS)[number];

export type ReleaseRecord = Record<ReleaseColumn, FieldValue>;
export type NoticeRecord = Record<NoticeColumn, string | null>;

function hasEveryColumn<C extends string, V>(columns: readonly C[], record: Partial<Record<C, V>>): record is Record<C, V> {
  return columns.every((column) => column in record);
}

/** Every column of `columns`, in order, filled from `values` and null elsewhere. */
function buildRecord<C extends string, V extends FieldValue>(
  columns: readonly C[],
  values: Partial<Record<C, V>>,
): Record<C, V | null> {
  const out: Partial<Record<C, V | null>> = {};
  for (const column of columns) {
    out[column] = values[column] ?? null;
  }
  if (!hasEveryColumn(columns, out)) {
    throw new Error('record is missing columns');
  }
  return out;
}

export function buildReleaseRecord(values: Partial<ReleaseRecord>): ReleaseRecord {
  return buildRecord(RELEASE_COLUMNS, values);
}

export function buildNoticeRecord(values: Partial<NoticeRecord>): NoticeRecord {
  return buildRecord(NOTICE_COLUMNS, values);
}
