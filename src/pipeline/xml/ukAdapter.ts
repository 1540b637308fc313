import { buildNoticeRecord, type NoticeRecord } from '../../records/schema.js';
import { joinSorted } from '../../utils/text.js';
import { childOf, childrenOf, find, plain, text, type XmlElement } from '../../xml/tree.js';
import { classifyUkNotice, inferContractType } from '../classify/noticeType.js';
import type { UkFormTag } from './constants.js';

interface UkBuyer {
  name: string | null;
  country: string | null;
  town: string | null;
  postcode: string | null;
  region: string | null;
  url: string | null;
}

interface UkParty extends UkBuyer {
  roles: string[];
}

const EMPTY_BUYER: UkBuyer = { name: null, country: null, town: null, postcode: null, region: null, url: null };

function readParty(party: XmlElement): UkParty {
  const address = childOf(party, plain('address'));
  return {
    roles: childrenOf(party, plain('roles'))
      .map((role) => text(role))
      .filter((role): role is string => role !== null),
    name: text(childOf(party, plain('name'))),
    country: text(childOf(address, plain('country'))),
    town: text(childOf(address, plain('locality'))),
    postcode: text(childOf(address, plain('postalCode'))),
    region: text(childOf(address, plain('region'))),
    url: text(childOf(childOf(party, plain('details')), plain('url'))),
  };
}

/** First named buyer party, else the first buyer party; `buyer/name` fills a missing name. */
function findBuyer(form: XmlElement, parties: UkParty[]): UkBuyer {
  const buyers = parties.filter((p) => p.roles.includes('buyer'));
  const party = buyers.find((p) => p.name !== null) ?? buyers[0];
  const buyer: UkBuyer = party ? { ...party } : { ...EMPTY_BUYER };
  if (!buyer.name) {
    buyer.name = text(childOf(childOf(form, plain('buyer')), plain('name')));
  }
  return buyer;
}

function awardItems(form: XmlElement): XmlElement[] {
  return childrenOf(form, plain('awards')).flatMap((award) => childrenOf(award, plain('items')));
}

function collectCpvCodes(items: XmlElement[]): string[] {
  return items
    .flatMap((item) => childrenOf(item, plain('additionalClassifications')))
    .filter((classification) => text(childOf(classification, plain('scheme'))) === 'CPV')
    .map((classification) => text(childOf(classification, plain('id'))))
    .filter((id): id is string => id !== null);
}

/** Supplier names from the form's parties plus every award's own `suppliers` references. */
function supplierNames(form: XmlElement, parties: UkParty[]): Array<string | null> {
  const fromParties = parties.filter((party) => party.roles.includes('supplier')).map((party) => party.name);
  const fromAwards = childrenOf(form, plain('awards'))
    .flatMap((award) => childrenOf(award, plain('suppliers')))
    .map((supplier) => text(childOf(supplier, plain('name'))));
  return [...fromParties, ...fromAwards];
}

function mainProcurementCategory(form: XmlElement): string | null {
  for (const award of childrenOf(form, plain('awards'))) {
    const category = text(childOf(award, plain('mainProcurementCategory')));
    if (category) {
      return category;
    }
  }
  return null;
}

/** Normalizes one of the un-namespaced UK notice forms. */
export function normalizeUkNotice(root: XmlElement, formTag: UkFormTag): NoticeRecord {
  const noticeData = childOf(root, plain('NOTICE_DATA'));
  const shortForm = formTag.replace('_2023', '');
  const header = {
    schema_type: formTag,
    form_type: shortForm,
    td_document_type_code: shortForm,
    no_doc_ojs: text(childOf(noticeData, plain('NO_DOC_EXT'))),
    notice_url: text(childOf(noticeData, plain('URI_DOC'))),
  };
  const docId = text(childOf(noticeData, plain('DOC_ID')));
  const published = text(childOf(noticeData, plain('PUBLISHED')));

  const form = find(root, plain(formTag));
  if (!form) {
    return buildNoticeRecord({ ...header, notice_type_group: 'OTHER', doc_id: docId, date_pub: published });
  }

  const parties = childrenOf(form, plain('parties')).map(readParty);
  const buyer = findBuyer(form, parties);

  const items = awardItems(form);
  const cpvCodes = collectCpvCodes(items);
  const deliveryRegions = items
    .flatMap((item) => childrenOf(item, plain('deliveryAddresses')))
    .map((address) => text(childOf(address, plain('region'))));

  const tender = childOf(form, plain('tender'));
  const title = text(childOf(tender, plain('title')));
  const tags = childrenOf(form, plain('tag'))
    .map((tag) => text(tag))
    .filter((tag): tag is string => tag !== null);

  return buildNoticeRecord({
    ...header,
    notice_type_group: classifyUkNotice(formTag, tags),

    doc_id: docId ?? text(childOf(form, plain('id'))),
    date_pub: published ?? text(childOf(form, plain('date'))),

    iso_country: buyer.country,
    ti_town: buyer.town,
    ca_country_code: buyer.country,
    ca_town: buyer.town,
    ca_postcode: buyer.postcode,
    ca_nuts_code: buyer.region,
    perf_nuts_code: joinSorted(deliveryRegions),

    ca_name: buyer.name,
    ca_url: buyer.url,

    original_cpv_code: cpvCodes[0] ?? null,
    cpv_main_code: cpvCodes[0] ?? null,
    additional_cpv_codes: joinSorted(cpvCodes.slice(1)),

    ti_text: title,
    obj_title: title,
    short_descr: text(childOf(tender, plain('description'))),
    type_contract_ctype: inferContractType(mainProcurementCategory(form)),

    contractor_names: joinSorted(supplierNames(form, parties)),
  });
}
