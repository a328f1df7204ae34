/**
 * Item identifiers carry their metadata in the file name. Two naming
 * conventions are recognised:
 *
 *   MIS_AGVV_PRODUCT_20250908T232505Z_20250909T010458Z_07282E.h5
 *     reference time, creation time, ordinal = orbit + frame letter,
 *     version = the two letters after the agency code
 *
 *   MI_CLAS_PRODUCT_20230422T165721033_005543989_027018_0001.DBL
 *     reference time with milliseconds, duration, ordinal = 6-digit orbit;
 *     version is not in the name but in the locator path
 *     (`.../PRODUCT/VERSION/YYYY/MM/DD/...`)
 */

export interface ParsedIdentifier {
  readonly fileName: string;
  readonly productType: string | null;
  readonly version: string | null;
  readonly referenceTime: number | null;
  readonly creationTime: number | null;
  readonly ordinal: string | null;
}

const REFERENCE_WITH_MS = /_(\d{8}T\d{9})_/;
const REFERENCE_SECONDS = /_(\d{8}T\d{6})Z?_/;
const CREATION = /_\d{8}T\d{6}Z_(\d{8}T\d{6})Z_/;
const ORDINAL_FRAME = /_(\d{5})([A-Z])\.[a-zA-Z0-9]+$/i;
const ORDINAL_ORBIT = /_(\d{6})_\d{4}\.[A-Z]{3}$/i;
const PRODUCT = /^[A-Z]{2,3}_[A-Z]{4}_(.+?)_\d{8}T\d{6}(?:\d{3}|Z)_/;
const VERSION_IN_NAME = /^[A-Z]{3}_[A-Z]{2}([A-Z]{2})_.+_\d{8}T\d{6}Z_/;

/** Last path segment of a URL or filesystem path, without query or fragment. */
export function fileNameOf(locator: string): string {
  const withoutQuery = locator.split(/[?#]/, 1)[0] ?? '';
  const segments = withoutQuery.split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

function parseCompactTimestamp(stamp: string): number | null {
  const match = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})?$/.exec(stamp);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, ms] = match;
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const result = Date.UTC(Number(y), month - 1, day, hour, minute, second, ms ? Number(ms) : 0);
  // Reject rollovers such as February 30th
  return new Date(result).getUTCDate() === day ? result : null;
}

/** Reference (sensing start) time in epoch milliseconds. */
export function extractReferenceTime(locator: string): number | null {
  const name = fileNameOf(locator);

  const precise = REFERENCE_WITH_MS.exec(name);
  if (precise?.[1]) {
    const parsed = parseCompactTimestamp(precise[1]);
    if (parsed !== null) return parsed;
  }

  const seconds = REFERENCE_SECONDS.exec(name);
  if (seconds?.[1]) {
    return parseCompactTimestamp(seconds[1]);
  }

  return null;
}

export function extractCreationTime(locator: string): number | null {
  const match = CREATION.exec(fileNameOf(locator));
  return match?.[1] ? parseCompactTimestamp(match[1]) : null;
}

export function extractOrdinal(locator: string): string | null {
  const name = fileNameOf(locator);

  const frame = ORDINAL_FRAME.exec(name);
  if (frame?.[1] && frame[2]) {
    return `${frame[1]}${frame[2].toUpperCase()}`;
  }

  const orbit = ORDINAL_ORBIT.exec(name);
  return orbit?.[1] ?? null;
}

export function extractProductType(locator: string): string | null {
  const match = PRODUCT.exec(fileNameOf(locator));
  return match?.[1] ?? null;
}

export function extractVersion(locator: string): string | null {
  const name = fileNameOf(locator);

  const inName = VERSION_IN_NAME.exec(name);
  if (inName?.[1]) return inName[1];

  const productType = extractProductType(name);
  if (productType === null) return null;

  const escaped = productType.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const inPath = new RegExp(`/${escaped}/([A-Za-z0-9]+)/\\d{4}/`, 'i').exec(locator);
  return inPath?.[1] ? inPath[1].toUpperCase() : null;
}

export function parseIdentifier(locator: string): ParsedIdentifier {
  return {
    fileName: fileNameOf(locator),
    productType: extractProductType(locator),
    version: extractVersion(locator),
    referenceTime: extractReferenceTime(locator),
    creationTime: extractCreationTime(locator),
    ordinal: extractOrdinal(locator),
  };
}
