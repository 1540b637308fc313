import { buildNoticeRecord, type NoticeRecord } from '../../records/schema.js';
import type { NoticeSource } from '../../types.js';
import { find, parseXml, plain, type XmlElement } from '../../xml/tree.js';
import { UK_FORM_TAGS, type UkFormTag } from './constants.js';
import { normalizeTedNotice } from './tedAdapter.js';
import { normalizeUkNotice } from './ukAdapter.js';

export type NoticeSchema = { kind: 'uk'; formTag: UkFormTag } | { kind: 'ted' };

/** The first UK form tag present anywhere in the document selects the UK dialect; otherwise TED. */
export function detectNoticeSchema(root: XmlElement): NoticeSchema {
  for (const formTag of UK_FORM_TAGS) {
    if (find(root, plain(formTag))) {
      return { kind: 'uk', formTag };
    }
  }
  return { kind: 'ted' };
}

export function normalizeNoticeTree(root: XmlElement): NoticeRecord {
  const schema = detectNoticeSchema(root);
  return schema.kind === 'uk' ? normalizeUkNotice(root, schema.formTag) : normalizeTedNotice(root);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function withSource(record: NoticeRecord, source: NoticeSource): NoticeRecord {
  return {
    ...record,
    source_xml_file: source.xmlFile ?? null,
    source_archive: source.archive ?? null,
  };
}

/**
 * Parses one Find a Tender XML notice and normalizes it with the adapter for its dialect.
 * Never throws: unparseable input yields a record carrying only `parse_error`.
 */
export function normalizeNoticeXml(xml: string, source: NoticeSource = {}): NoticeRecord {
  let record: NoticeRecord;
  try {
    record = normalizeNoticeTree(parseXml(xml));
  } catch (error) {
    record = buildNoticeRecord({ parse_error: describeError(error) });
  }
  return withSource(record, source);
}
