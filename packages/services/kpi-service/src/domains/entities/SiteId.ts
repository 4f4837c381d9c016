/**
 * Canonical textual site identifier.
 *
 * Counter rows carry numeric site ids while the site table may carry text;
 * both are converted once at the ingestion boundary so joins compare like with like.
 */

import { KpiError } from '../../application/errors';

declare const siteIdBrand: unique symbol;
export type SiteId = string & { readonly [siteIdBrand]: true };

const INTEGRAL_TEXT = /^([+-]?)0*(\d+?)(?:\.0+)?$/;
const NUMERIC_ID = /^-?\d+$/;

function isCanonical(value: string): value is SiteId {
  return value.length > 0;
}

/**
 * Integral text without sign `+`, leading zeros or a `.0` suffix; never goes
 * through `number`, so long ids keep every digit
 */
function canonicalText(text: string): string {
  const match = INTEGRAL_TEXT.exec(text);
  const digits = match?.[2];
  if (!match || digits === undefined) return text;
  return match[1] === '-' && digits !== '0' ? `-${digits}` : digits;
}

export function toSiteId(value: unknown): SiteId {
  let text: string;

  if (typeof value === 'number') {
    if (!Number.isInteger(value)) throw KpiError.invalidSiteId(value);
    text = BigInt(value).toString();
  } else if (typeof value === 'bigint') {
    text = value.toString();
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    text = canonicalText(trimmed);
  } else {
    throw KpiError.invalidSiteId(value);
  }

  if (!isCanonical(text)) throw KpiError.invalidSiteId(value);
  return text;
}

/**
 * Integer form used for cluster membership; null for non-numeric ids and for
 * ids too long to hold exactly
 */
export function siteNumber(id: SiteId): number | null {
  if (!NUMERIC_ID.test(id)) return null;
  const value = Number(id);
  return Number.isSafeInteger(value) ? value : null;
}
