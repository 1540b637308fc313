export type FieldValue = string | number | boolean | null;

export type NoticeTypeGroup = 'PIN' | 'CONTRACT_NOTICE' | 'CONTRACT_AWARD' | 'MODIFICATION' | 'PLANNING' | 'OTHER';

export type ContractType = 'WORKS' | 'SERVICES' | 'SUPPLIES';

export type ReleaseStatus = 'ok' | 'fetch_failed_or_invalid_json' | 'duplicate_uri_skipped_fetch';

export interface NoticeSource {
  xmlFile?: string;
  archive?: string;
}

export interface ReleaseSource {
  sourceFile: string | null;
  rowIndex: number | null;
  uri: string;
}

export type ReleaseFetch = { ok: true; document: unknown } | { ok: false; reason: string };

export interface ReleaseRow extends ReleaseSource {
  fetch: ReleaseFetch;
}
