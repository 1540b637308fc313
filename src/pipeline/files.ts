import fs from 'node:fs/promises';
import path from 'node:path';
import { config, type FallbackEncoding } from '../config.js';
import type { NoticeRecord } from '../records/schema.js';
import type { ReleaseRow } from '../types.js';
import { normalizeNoticeXml } from './xml/dispatcher.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** UTF-8 when the bytes are valid UTF-8, otherwise the fallback encoding. A leading BOM is dropped. */
export function decodeXmlBytes(bytes: Uint8Array, fallback: FallbackEncoding = config.xmlFallbackEncoding): string {
  try {
    return utf8.decode(bytes);
  } catch {
    return Buffer.from(bytes).toString(fallback);
  }
}

function hasExtension(file: string, extensions: readonly string[]): boolean {
  const lower = file.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}

async function walk(dir: string, extensions: readonly string[]): Promise<string[]> {
  const out: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      out.push(...(await walk(fullPath, extensions)));
    } else if (entry.isFile() && hasExtension(entry.name, extensions)) {
      out.push(fullPath);
    }
  }
  return out;
}

/** Expands directories (recursively) into the files with a matching extension; plain files pass through. */
export async function expandInputPaths(inputs: string[], extensions: readonly string[]): Promise<string[]> {
  const out: string[] = [];
  for (const input of inputs) {
    const fullPath = path.resolve(input);
    const stat = await fs.stat(fullPath);
    if (stat.isDirectory()) {
      out.push(...(await walk(fullPath, extensions)).sort());
    } else {
      out.push(fullPath);
    }
  }
  return out;
}

export async function normalizeNoticeFile(filePath: string): Promise<NoticeRecord> {
  const bytes = await fs.readFile(filePath);
  const xml = decodeXmlBytes(bytes);
  return normalizeNoticeXml(xml, config.includeSourceColumns ? { xmlFile: path.basename(filePath) } : {});
}

/** Reads a release package file into a batch row; unparseable JSON becomes a failed fetch. */
export async function readReleaseRow(filePath: string, rowIndex: number): Promise<ReleaseRow> {
  const raw = await fs.readFile(filePath, 'utf8');
  const source = {
    sourceFile: config.includeSourceColumns ? path.basename(filePath) : null,
    rowIndex,
    uri: filePath,
  };
  try {
    const document: unknown = JSON.parse(raw);
    return { ...source, fetch: { ok: true, document } };
  } catch (error) {
    return { ...source, fetch: { ok: false, reason: error instanceof Error ? error.message : String(error) } };
  }
}
