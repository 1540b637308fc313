import dotenv from 'dotenv';

dotenv.config();

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function asBool(value: string | undefined, fallback: boolean): boolean {
  if (value == null) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function asEnum<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const normalized = value?.trim().toLowerCase();
  return allowed.find((candidate) => candidate === normalized) ?? fallback;
}

function asList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
  return items.length ? items : fallback;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const FALLBACK_ENCODINGS = ['latin1', 'ascii', 'utf16le'] as const;
export type FallbackEncoding = (typeof FALLBACK_ENCODINGS)[number];

export const config = {
  logLevel: asEnum<LogLevel>(process.env.LOG_LEVEL, LOG_LEVELS, 'info'),

  xmlFallbackEncoding: asEnum<FallbackEncoding>(process.env.XML_FALLBACK_ENCODING, FALLBACK_ENCODINGS, 'latin1'),
  xmlFileExtensions: asList(process.env.XML_FILE_EXTENSIONS, ['.xml']),

  outputIndent: asNumber(process.env.OUTPUT_INDENT, 0),
  includeSourceColumns: asBool(process.env.INCLUDE_SOURCE_COLUMNS, true),
};
