#!/usr/bin/env node
import { Command } from 'commander';
import { config } from '../config.js';
import { logger } from '../logger.js';
import type { NoticeRecord, ReleaseRecord } from '../records/schema.js';
import { classifyTedDocumentType } from '../pipeline/classify/noticeType.js';
import { expandInputPaths, normalizeNoticeFile, readReleaseRow } from '../pipeline/files.js';
import { normalizeReleaseBatch } from '../pipeline/ocds/releaseBatch.js';

function writeRecord(record: NoticeRecord | ReleaseRecord): void {
  const indent = config.outputIndent > 0 ? config.outputIndent : undefined;
  process.stdout.write(`${JSON.stringify(record, null, indent)}\n`);
}

const program = new Command();
program
  .name('procurement-normalizer')
  .description('Normalize UK procurement notices (Find a Tender XML, Contracts Finder OCDS JSON) into flat records')
  .version('0.1.0');

program
  .command('notices')
  .description('Normalize Find a Tender XML notices; directories are walked for XML files')
  .argument('<paths...>', 'XML files or directories')
  .action(async (paths: string[]) => {
    const files = await expandInputPaths(paths, config.xmlFileExtensions);
    if (!files.length) {
      throw new Error(`No XML files found in: ${paths.join(', ')}`);
    }

    const bySchema = new Map<string, number>();
    let parseErrors = 0;

    for (const file of files) {
      const record = await normalizeNoticeFile(file);
      if (record.parse_error) {
        parseErrors += 1;
        logger.warn({ file, error: record.parse_error }, 'Notice could not be parsed');
      } else {
        const schema = record.schema_type ?? 'unknown';
        bySchema.set(schema, (bySchema.get(schema) ?? 0) + 1);
      }
      writeRecord(record);
    }

    logger.info({ files: files.length, parseErrors, bySchema: Object.fromEntries(bySchema) }, 'Notices normalized');
  });

program
  .command('releases')
  .description('Normalize Contracts Finder OCDS release packages')
  .argument('<paths...>', 'JSON release package files')
  .action(async (paths: string[]) => {
    const files = await expandInputPaths(paths, ['.json']);
    if (!files.length) {
      throw new Error(`No JSON files found in: ${paths.join(', ')}`);
    }
    const rows = await Promise.all(files.map((file, idx) => readReleaseRow(file, idx)));
    const records = normalizeReleaseBatch(rows);

    const counts: Record<string, number> = {};
    for (const record of records) {
      const status = String(record.status);
      counts[status] = (counts[status] ?? 0) + 1;
      writeRecord(record);
    }

    logger.info({ files: files.length, records: records.length, counts }, 'Releases normalized');
  });

program
  .command('classify')
  .description('Print the notice group of a TED document type code')
  .argument('<code>', 'TD_DOCUMENT_TYPE code, e.g. 3 or 7')
  .action((code: string) => {
    process.stdout.write(`${classifyTedDocumentType(code)}\n`);
  });

program.parseAsync().catch((error) => {
  logger.error({ err: error }, 'CLI failed');
  process.exitCode = 1;
});
