import { buildNoticeRecord, type NoticeRecord } from '../../records/schema.js';
import { joinSorted } from '../../utils/text.js';
import { attribute, childOf, find, findAll, text, type Step, type XmlElement } from '../../xml/tree.js';
import { classifyTedDocumentType } from '../classify/noticeType.js';
import { TED_SCHEMA_TYPE } from './constants.js';
import { resolveTedNamespaces, type TedNamespaces } from './namespaces.js';

function valueWithCurrency(el: XmlElement | null): { value: string | null; currency: string | null } {
  return { value: text(el), currency: attribute(el, 'CURRENCY') };
}

/** Tries each NUTS namespace in order and returns the first non-empty `CODE`. */
function firstNutsCode(ns: TedNamespaces, lookup: (nuts: TedNamespaces['ted']) => XmlElement | null): string | null {
  for (const nuts of ns.nuts) {
    const code = attribute(lookup(nuts), 'CODE');
    if (code) {
      return code;
    }
  }
  return null;
}

function findFormType(root: XmlElement, ns: TedNamespaces): string | null {
  const formSection = find(root, ns.ted('FORM_SECTION'));
  const form = formSection?.children.find((child) => 'FORM' in child.attributes);
  return form ? attribute(form, 'FORM') : null;
}

/** Normalizes a legacy TED R2.0.9 notice (forms F01–F21). */
export function normalizeTedNotice(root: XmlElement): NoticeRecord {
  const ns = resolveTedNamespaces(root);
  const { ted } = ns;
  const codeOf = (...path: Step[]): string | null => attribute(find(root, ...path), 'CODE');

  // CPV
  const additionalCpv = findAll(root, ted('OBJECT_DESCR'), ted('CPV_ADDITIONAL'), ted('CPV_CODE')).map((el) =>
    attribute(el, 'CODE'),
  );

  // NUTS
  const perfNuts = ns.nuts.flatMap((nuts) =>
    findAll(root, ted('NOTICE_DATA'), nuts('PERFORMANCE_NUTS')).map((el) => attribute(el, 'CODE')),
  );
  const caCeNuts = firstNutsCode(ns, (nuts) => find(root, ted('NOTICE_DATA'), nuts('CA_CE_NUTS')));

  // English translation
  const titleDoc = find(root, ted('TRANSLATION_SECTION'), ted('ML_TITLES'), ted('ML_TI_DOC', { LG: 'EN' }));

  // contracting authority
  const caAddress = find(root, ted('CONTRACTING_BODY'), ted('ADDRESS_CONTRACTING_BODY'));
  const caNuts = firstNutsCode(ns, (nuts) => childOf(caAddress, nuts('NUTS')));

  const shortDescr =
    find(root, ted('OBJECT_CONTRACT'), ted('SHORT_DESCR'), ted('P')) ??
    find(root, ted('OBJECT_DESCR'), ted('SHORT_DESCR'), ted('P'));

  // values
  const total = valueWithCurrency(find(root, ted('OBJECT_CONTRACT'), ted('VAL_TOTAL')));
  const estimated = valueWithCurrency(
    find(root, ted('NOTICE_DATA'), ted('VALUES'), ted('VALUE', { TYPE: 'ESTIMATED_TOTAL' })),
  );
  const procurement = valueWithCurrency(
    find(root, ted('NOTICE_DATA'), ted('VALUES'), ted('VALUE', { TYPE: 'PROCUREMENT_TOTAL' })),
  );

  // award
  const awarded = [ted('AWARD_CONTRACT'), ted('AWARDED_CONTRACT')];
  const awardTotal = valueWithCurrency(find(root, ...awarded, ted('VALUES'), ted('VAL_TOTAL')));
  const contractors = findAll(root, ...awarded, ted('CONTRACTORS'), ted('CONTRACTOR')).map((contractor) =>
    text(childOf(childOf(contractor, ted('ADDRESS_CONTRACTOR')), ted('OFFICIALNAME'))),
  );

  const documentType = codeOf(ted('CODIF_DATA'), ted('TD_DOCUMENT_TYPE'));

  return buildNoticeRecord({
    schema_type: TED_SCHEMA_TYPE,
    form_type: findFormType(root, ns),
    td_document_type_code: documentType,
    notice_type_group: classifyTedDocumentType(documentType),

    doc_id: attribute(root, 'DOC_ID'),
    edition: attribute(root, 'EDITION'),
    no_doc_ojs: text(find(root, ted('NOTICE_DATA'), ted('NO_DOC_OJS'))),
    notice_url: text(find(root, ted('NOTICE_DATA'), ted('URI_LIST'), ted('URI_DOC', { LG: 'EN' }))),

    date_pub: text(find(root, ted('REF_OJS'), ted('DATE_PUB'))),
    ds_date_dispatch: text(find(root, ted('CODIF_DATA'), ted('DS_DATE_DISPATCH'))),
    award_date: text(find(root, ...awarded, ted('DATE_CONCLUSION_CONTRACT'))),

    iso_country: attribute(find(root, ted('NOTICE_DATA'), ted('ISO_COUNTRY')), 'VALUE'),
    ti_country: text(childOf(titleDoc, ted('TI_CY'))),
    ti_town: text(childOf(titleDoc, ted('TI_TOWN'))),
    ca_country_code: attribute(childOf(caAddress, ted('COUNTRY')), 'VALUE'),
    ca_town: text(childOf(caAddress, ted('TOWN'))),
    ca_postcode: text(childOf(caAddress, ted('POSTAL_CODE'))),
    ca_nuts_code: caNuts,
    perf_nuts_code: joinSorted(perfNuts),
    ca_ce_nuts_code: caCeNuts,

    ca_name: text(childOf(caAddress, ted('OFFICIALNAME'))),
    ca_email: text(childOf(caAddress, ted('E_MAIL'))),
    ca_url: text(childOf(caAddress, ted('URL_GENERAL'))),

    original_cpv_code: codeOf(ted('NOTICE_DATA'), ted('ORIGINAL_CPV')),
    cpv_main_code: codeOf(ted('OBJECT_CONTRACT'), ted('CPV_MAIN'), ted('CPV_CODE')),
    additional_cpv_codes: joinSorted(additionalCpv),

    ti_text: text(childOf(childOf(titleDoc, ted('TI_TEXT')), ted('P'))),
    obj_title: text(find(root, ted('OBJECT_CONTRACT'), ted('TITLE'), ted('P'))),
    short_descr: text(shortDescr),
    type_contract_ctype: attribute(find(root, ted('OBJECT_CONTRACT'), ted('TYPE_CONTRACT')), 'CTYPE'),

    val_total: total.value,
    val_total_currency: total.currency,
    est_total_val: estimated.value,
    est_total_val_currency: estimated.currency,
    proc_total_val: procurement.value,
    proc_total_val_currency: procurement.currency,
    aw_val_total: awardTotal.value,
    aw_val_currency: awardTotal.currency,
    nb_tenders: text(find(root, ...awarded, ted('TENDERS'), ted('NB_TENDERS_RECEIVED'))),

    nc_contract_nature_code: codeOf(ted('CODIF_DATA'), ted('NC_CONTRACT_NATURE')),
    pr_proc_code: codeOf(ted('CODIF_DATA'), ted('PR_PROC')),
    ac_award_crit_code: codeOf(ted('CODIF_DATA'), ted('AC_AWARD_CRIT')),
    ma_main_activities_code: codeOf(ted('CODIF_DATA'), ted('MA_MAIN_ACTIVITIES')),
    rp_regulation_code: codeOf(ted('CODIF_DATA'), ted('RP_REGULATION')),

    contractor_names: joinSorted(contractors),
  });
}
