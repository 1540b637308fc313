import { buildReleaseRecord, type ReleaseRecord } from '../../records/schema.js';
import type { FieldValue, ReleaseSource } from '../../types.js';
import { dig, digArray, digObject, digValue, isObject, pluck, type JsonObject } from '../../utils/path.js';
import { joinOrdered } from '../../utils/text.js';
import { classifyReleaseTags } from '../classify/noticeType.js';

interface DocumentColumns {
  ids: string | null;
  types: string | null;
  descriptions: string | null;
  urls: string | null;
  datePublished: string | null;
  dateModified: string | null;
  formats: string | null;
  languages: string | null;
}

/**
 * Flattens a `documents` array into one joined column per attribute.
 * Columns are joined independently, so positions do not line up when entries lack an attribute.
 */
function flattenDocuments(documents: unknown[]): DocumentColumns {
  return {
    ids: joinOrdered(pluck(documents, 'id')),
    types: joinOrdered(pluck(documents, 'documentType')),
    descriptions: joinOrdered(pluck(documents, 'description')),
    urls: joinOrdered(pluck(documents, 'url')),
    datePublished: joinOrdered(pluck(documents, 'datePublished')),
    dateModified: joinOrdered(pluck(documents, 'dateModified')),
    formats: joinOrdered(pluck(documents, 'format')),
    languages: joinOrdered(pluck(documents, 'language')),
  };
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function hasRole(party: unknown, role: string): boolean {
  return stringList(dig(party, 'roles')).includes(role);
}

/** Party whose id equals `release.buyer.id`. */
export function findBuyerParty(release: unknown): JsonObject | null {
  const buyerId = digValue(release, 'buyer', 'id');
  if (buyerId == null || buyerId === '') {
    return null;
  }
  const party = digArray(release, 'parties').find((p) => isObject(p) && p.id === buyerId);
  return isObject(party) ? party : null;
}

/** Every party holding the `supplier` role, in document order. */
export function findSupplierParties(release: unknown): JsonObject[] {
  return digArray(release, 'parties').filter(isObject).filter((party) => hasRole(party, 'supplier'));
}

function findDocumentOfType(container: unknown, documentType: string): JsonObject {
  const doc = digArray(container, 'documents').find((d) => digValue(d, 'documentType') === documentType);
  return isObject(doc) ? doc : {};
}

interface DeliveryColumns {
  postalCodesAll: string | null;
  regionsAll: string | null;
  countriesAll: string | null;
  postalCode: FieldValue;
  region: FieldValue;
  country: FieldValue;
}

/**
 * `_all` columns cover every item; the single-valued columns take the first
 * non-empty value per attribute among the first item's addresses.
 */
function extractDelivery(items: unknown[]): DeliveryColumns {
  const addressesOf = (item: unknown): JsonObject[] => digArray(item, 'deliveryAddresses').filter(isObject);
  const all = items.flatMap(addressesOf);
  const first = items.length ? addressesOf(items[0]) : [];
  const firstValue = (key: string): FieldValue =>
    first.map((address) => digValue(address, key)).find((value) => value != null && value !== '') ?? null;

  return {
    postalCodesAll: joinOrdered(pluck(all, 'postalCode')),
    regionsAll: joinOrdered(pluck(all, 'region')),
    countriesAll: joinOrdered(pluck(all, 'countryName')),
    postalCode: firstValue('postalCode'),
    region: firstValue('region'),
    country: firstValue('countryName'),
  };
}

function nonEmptyString(value: FieldValue): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

/**
 * Projects an OCDS release package onto one flat record.
 * Only the first release and, within it, the first award are read.
 */
export function normalizeRelease(pkg: unknown, source: ReleaseSource): ReleaseRecord {
  const release = digObject(pkg, 'releases', 0);
  const tags = stringList(release.tag);

  const planning = digObject(release, 'planning');
  const milestones = digArray(planning, 'milestones');
  const planningDocs = flattenDocuments(digArray(planning, 'documents'));

  const tender = digObject(release, 'tender');
  const tenderDocs = flattenDocuments(digArray(tender, 'documents'));
  const additionalClassifications = digArray(tender, 'additionalClassifications');
  const items = digArray(tender, 'items');
  const delivery = extractDelivery(items);
  const tenderNotice = findDocumentOfType(tender, 'tenderNotice');

  const buyer = findBuyerParty(release) ?? {};

  const suppliers = findSupplierParties(release);
  const supplierRoles = suppliers.flatMap((party) => stringList(party.roles));

  const award = digObject(release, 'awards', 0);
  const awardSuppliers = digArray(award, 'suppliers');
  const awardNotice = findDocumentOfType(award, 'awardNotice');
  const awardDocs = flattenDocuments(digArray(award, 'documents'));

  return buildReleaseRecord({
    source_file: source.sourceFile,
    row_index: source.rowIndex,
    status: 'ok',

    uri: nonEmptyString(digValue(pkg, 'uri')) ?? source.uri,
    publishedDate: digValue(pkg, 'publishedDate'),
    ocid: digValue(release, 'ocid'),
    release_id: digValue(release, 'id'),
    release_title: digValue(release, 'title'),
    release_date: digValue(release, 'date'),
    release_language: digValue(release, 'language'),
    release_tag: tags[0] ?? null,
    release_tags_all: joinOrdered(tags),
    notice_type_group: classifyReleaseTags(tags),
    initiationType: digValue(release, 'initiationType'),

    planning_milestone_ids: joinOrdered(pluck(milestones, 'id')),
    planning_milestone_titles: joinOrdered(pluck(milestones, 'title')),
    planning_milestone_types: joinOrdered(pluck(milestones, 'type')),
    planning_milestone_dueDates: joinOrdered(pluck(milestones, 'dueDate')),
    planning_document_ids: planningDocs.ids,
    planning_document_types: planningDocs.types,
    planning_document_descriptions: planningDocs.descriptions,
    planning_document_urls: planningDocs.urls,
    planning_document_datePublished: planningDocs.datePublished,
    planning_document_formats: planningDocs.formats,
    planning_document_languages: planningDocs.languages,

    publisher_name: digValue(pkg, 'publisher', 'name'),
    publisher_scheme: digValue(pkg, 'publisher', 'scheme'),
    publisher_uid: digValue(pkg, 'publisher', 'uid'),
    publisher_uri: digValue(pkg, 'publisher', 'uri'),
    version: digValue(pkg, 'version'),
    extensions: joinOrdered(digArray(pkg, 'extensions').map((ext) => digValue(ext))),
    license: digValue(pkg, 'license'),
    publicationPolicy: digValue(pkg, 'publicationPolicy'),

    tender_id: digValue(tender, 'id'),
    tender_title: digValue(tender, 'title'),
    tender_description: digValue(tender, 'description'),
    tender_status: digValue(tender, 'status'),
    mainProcurementCategory: digValue(tender, 'mainProcurementCategory'),

    value_amount: digValue(tender, 'value', 'amount'),
    value_currency: digValue(tender, 'value', 'currency'),
    minValue_amount: digValue(tender, 'minValue', 'amount'),
    minValue_currency: digValue(tender, 'minValue', 'currency'),

    cpv_scheme: digValue(tender, 'classification', 'scheme'),
    cpv_id: digValue(tender, 'classification', 'id'),
    cpv_description: digValue(tender, 'classification', 'description'),
    additional_cpv_ids: joinOrdered(pluck(additionalClassifications, 'id')),
    additional_cpv_descriptions: joinOrdered(pluck(additionalClassifications, 'description')),

    tender_document_ids: tenderDocs.ids,
    tender_document_types: tenderDocs.types,
    tender_document_descriptions: tenderDocs.descriptions,
    tender_document_urls: tenderDocs.urls,
    tender_document_datePublished: tenderDocs.datePublished,
    tender_document_dateModified: tenderDocs.dateModified,
    tender_document_formats: tenderDocs.formats,
    tender_document_languages: tenderDocs.languages,

    tender_item_ids: joinOrdered(pluck(items, 'id')),
    tender_delivery_postalCodes_all: delivery.postalCodesAll,
    tender_delivery_regions_all: delivery.regionsAll,
    tender_delivery_countryNames_all: delivery.countriesAll,
    delivery_postalCode: delivery.postalCode,
    delivery_region: delivery.region,
    delivery_country: delivery.country,

    tender_datePublished: digValue(tender, 'datePublished'),
    tender_endDate: digValue(tender, 'tenderPeriod', 'endDate'),
    contract_startDate: digValue(tender, 'contractPeriod', 'startDate'),
    contract_endDate: digValue(tender, 'contractPeriod', 'endDate'),

    procurementMethod: digValue(tender, 'procurementMethod'),
    procurementMethodDetails: digValue(tender, 'procurementMethodDetails'),
    suitability_sme: digValue(tender, 'suitability', 'sme'),
    suitability_vcse: digValue(tender, 'suitability', 'vcse'),

    buyer_id: digValue(release, 'buyer', 'id'),
    buyer_name: digValue(release, 'buyer', 'name'),
    buyer_legalName: digValue(buyer, 'identifier', 'legalName'),
    buyer_identifier_scheme: digValue(buyer, 'identifier', 'scheme'),
    buyer_identifier_id: digValue(buyer, 'identifier', 'id'),
    buyer_streetAddress: digValue(buyer, 'address', 'streetAddress'),
    buyer_locality: digValue(buyer, 'address', 'locality'),
    buyer_postalCode: digValue(buyer, 'address', 'postalCode'),
    buyer_countryName: digValue(buyer, 'address', 'countryName'),
    buyer_contact_name: digValue(buyer, 'contactPoint', 'name'),
    buyer_contact_email: digValue(buyer, 'contactPoint', 'email'),
    buyer_contact_telephone: digValue(buyer, 'contactPoint', 'telephone'),
    buyer_details_url: digValue(buyer, 'details', 'url'),
    buyer_roles: joinOrdered(stringList(buyer.roles)),

    supplier_party_ids: joinOrdered(pluck(suppliers, 'id')),
    supplier_party_names: joinOrdered(pluck(suppliers, 'name')),
    supplier_legalNames: joinOrdered(pluck(suppliers, 'identifier', 'legalName')),
    supplier_identifier_schemes: joinOrdered(pluck(suppliers, 'identifier', 'scheme')),
    supplier_identifier_ids: joinOrdered(pluck(suppliers, 'identifier', 'id')),
    supplier_streetAddresses: joinOrdered(pluck(suppliers, 'address', 'streetAddress')),
    supplier_localities: joinOrdered(pluck(suppliers, 'address', 'locality')),
    supplier_postalCodes: joinOrdered(pluck(suppliers, 'address', 'postalCode')),
    supplier_countryNames: joinOrdered(pluck(suppliers, 'address', 'countryName')),
    supplier_scales: joinOrdered(pluck(suppliers, 'details', 'scale')),
    supplier_vcse_flags: joinOrdered(pluck(suppliers, 'details', 'vcse')),
    supplier_details_urls: joinOrdered(pluck(suppliers, 'details', 'url')),
    supplier_roles: joinOrdered(supplierRoles),

    tender_notice_url: digValue(tenderNotice, 'url'),
    tender_notice_description: digValue(tenderNotice, 'description'),

    award_id: digValue(award, 'id'),
    award_status: digValue(award, 'status'),
    award_date: digValue(award, 'date'),
    award_datePublished: digValue(award, 'datePublished'),
    award_value_amount: digValue(award, 'value', 'amount'),
    award_value_currency: digValue(award, 'value', 'currency'),
    award_contract_startDate: digValue(award, 'contractPeriod', 'startDate'),
    award_contract_endDate: digValue(award, 'contractPeriod', 'endDate'),
    award_suppliers_ids: joinOrdered(pluck(awardSuppliers, 'id')),
    award_suppliers_names: joinOrdered(pluck(awardSuppliers, 'name')),
    award_notice_url: digValue(awardNotice, 'url'),
    award_notice_description: digValue(awardNotice, 'description'),
    award_notice_datePublished: digValue(awardNotice, 'datePublished'),
    award_notice_format: digValue(awardNotice, 'format'),
    award_notice_language: digValue(awardNotice, 'language'),
    award_document_ids: awardDocs.ids,
    award_document_types: awardDocs.types,
    award_document_descriptions: awardDocs.descriptions,
    award_document_urls: awardDocs.urls,
    award_document_datePublished: awardDocs.datePublished,
    award_document_dateModified: awardDocs.dateModified,
    award_document_formats: awardDocs.formats,
    award_document_languages: awardDocs.languages,
  });
}
