export type {
  ContractType,
  FieldValue,
  NoticeSource,
  NoticeTypeGroup,
  ReleaseFetch,
  ReleaseRow,
  ReleaseSource,
  ReleaseStatus,
} from './types.js';

export {
  NOTICE_COLUMNS,
  RELEASE_COLUMNS,
  buildNoticeRecord,
  buildReleaseRecord,
  type NoticeColumn,
  type NoticeRecord,
  type ReleaseColumn,
  type ReleaseRecord,
} from './records/schema.js';

export { NUTS_NAMESPACES, TED_SCHEMA_TYPE, UK_AWARD_FORMS, UK_FORM_TAGS, isUkFormTag, type UkFormTag } from './pipeline/xml/constants.js';
export { detectNoticeSchema, normalizeNoticeTree, normalizeNoticeXml, type NoticeSchema } from './pipeline/xml/dispatcher.js';
export { normalizeTedNotice } from './pipeline/xml/tedAdapter.js';
export { normalizeUkNotice } from './pipeline/xml/ukAdapter.js';

export { findBuyerParty, findSupplierParties, normalizeRelease } from './pipeline/ocds/releaseAdapter.js';
export { normalizeReleaseBatch, normalizeReleaseRow } from './pipeline/ocds/releaseBatch.js';

export {
  classifyReleaseTags,
  classifyTedDocumentType,
  classifyUkNotice,
  inferContractType,
} from './pipeline/classify/noticeType.js';

export { XmlParseError, attribute, parseXml, text, type XmlElement } from './xml/tree.js';
export { JSON_JOIN, XML_JOIN, joinOrdered, joinSorted, joinUnique, type JoinPolicy } from './utils/text.js';
export { dig, digArray, digObject, digValue } from './utils/path.js';
