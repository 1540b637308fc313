import { buildReleaseRecord, type ReleaseRecord } from '../../records/schema.js';
import type { ReleaseRow, ReleaseSource, ReleaseStatus } from '../../types.js';
import { isObject } from '../../utils/path.js';
import { normalizeRelease } from './releaseAdapter.js';

function statusRecord(source: ReleaseSource, status: ReleaseStatus): ReleaseRecord {
  return buildReleaseRecord({
    source_file: source.sourceFile,
    row_index: source.rowIndex,
    uri: source.uri,
    status,
  });
}

/** One row: a record for the fetched package, or a status-only record when there is nothing to project. */
export function normalizeReleaseRow(row: ReleaseRow): ReleaseRecord {
  if (!row.fetch.ok || !isObject(row.fetch.document)) {
    return statusRecord(row, 'fetch_failed_or_invalid_json');
  }
  return normalizeRelease(row.fetch.document, row);
}

/**
 * Normalizes rows in order. A URI repeated within the batch yields a
 * `duplicate_uri_skipped_fetch` record; blank URIs are dropped.
 */
export function normalizeReleaseBatch(rows: Iterable<ReleaseRow>): ReleaseRecord[] {
  const seen = new Set<string>();
  const out: ReleaseRecord[] = [];

  for (const row of rows) {
    const uri = row.uri.trim();
    if (!uri) {
      continue;
    }
    if (seen.has(uri)) {
      out.push(statusRecord({ ...row, uri }, 'duplicate_uri_skipped_fetch'));
      continue;
    }
    seen.add(uri);
    out.push(normalizeReleaseRow({ ...row, uri }));
  }

  return out;
}
