import { NormalizationError } from '../errors.js';
import { canonicalText } from './canon.js';

interface CurrencyUnit {
  factor: number;
  decimal: '.' | ',';
}

// English units print `.` as the decimal separator, German units `,`.
const UNITS = new Map<string, CurrencyUnit>([
  ['k', { factor: 1_000, decimal: '.' }],
  ['th', { factor: 1_000, decimal: '.' }],
  ['m', { factor: 1_000_000, decimal: '.' }],
  ['bn', { factor: 1_000_000_000, decimal: '.' }],
  ['tsd', { factor: 1_000, decimal: ',' }],
  ['mio', { factor: 1_000_000, decimal: ',' }],
  ['mrd', { factor: 1_000_000_000, decimal: ',' }]
]);

const MISSING_MARKERS = new Set(['', '-', '--', '?', '—', '–', 'n/a', 'unknown', 'unbekannt']);

export interface FeeClassification {
  fee: number | null;
  isLoan: boolean;
}

function invalid(raw: string, field: string): NormalizationError {
  return new NormalizationError(`Unparseable currency value "${raw}"`, {
    code: 'INVALID_CURRENCY',
    field,
    value: raw
  });
}

/** Separator convention for amounts printed without a unit, e.g. `€1,500` or `1.500 €`. */
function inferDecimalSeparator(digits: string): '.' | ',' | undefined {
  const lastDot = digits.lastIndexOf('.');
  const lastComma = digits.lastIndexOf(',');
  if (lastDot !== -1 && lastComma !== -1) {
    return lastDot > lastComma ? '.' : ',';
  }
  const separator = lastDot !== -1 ? '.' : lastComma !== -1 ? ',' : undefined;
  if (!separator) return undefined;
  const occurrences = digits.split(separator).length - 1;
  const trailing = digits.slice(digits.lastIndexOf(separator) + 1);
  if (occurrences > 1 || trailing.length === 3) return undefined;
  return separator;
}

/**
 * Parses a currency string into whole euros. Missing markers give null.
 *
 * @example parseCurrency('€70.00m') // 70000000
 * @example parseCurrency('500 Tsd. €') // 500000
 */
export function parseCurrency(raw: string, field = 'market_value'): number | null {
  const text = canonicalText(raw).toLowerCase();
  if (MISSING_MARKERS.has(text)) return null;

  const compact = text.replace(/€|eur\b/g, '').replace(/\s+/g, '');
  const match = /^([0-9][0-9.,]*)([a-z]*)\.?$/.exec(compact);
  if (!match) throw invalid(raw, field);

  const [, digits, unitToken] = match;
  const unit = unitToken ? UNITS.get(unitToken) : undefined;
  if (unitToken && !unit) throw invalid(raw, field);

  const decimal = unit ? unit.decimal : inferDecimalSeparator(digits);
  const [integerPart, fractionPart = '', ...rest] = decimal ? digits.split(decimal) : [digits];
  if (rest.length) throw invalid(raw, field);

  const integerDigits = integerPart.replace(/[.,]/g, '');
  if (!/^\d+$/.test(integerDigits) || !/^\d*$/.test(fractionPart)) throw invalid(raw, field);

  const factor = unit?.factor ?? 1;
  const scaled = Number(`${integerDigits}${fractionPart}`) * factor;
  return Math.round(scaled / 10 ** fractionPart.length);
}

/**
 * Splits the fee column into an amount and the loan flag. Loans are only
 * recognized from explicit markers, never from the amount.
 */
export function classifyFee(raw: string): FeeClassification {
  const text = canonicalText(raw);
  const lower = text.toLowerCase();

  if (MISSING_MARKERS.has(lower)) return { fee: null, isLoan: false };
  if (['free transfer', 'free', 'ablösefrei', 'draft'].includes(lower)) {
    return { fee: null, isLoan: false };
  }
  if (lower.startsWith('loan fee') || lower.startsWith('leihgebühr')) {
    const amount = text.slice(text.indexOf(':') + 1);
    return { fee: text.includes(':') ? parseCurrency(amount, 'fee') : null, isLoan: true };
  }
  if (['loan transfer', 'loan', 'leihe'].includes(lower)) {
    return { fee: null, isLoan: true };
  }
  if (lower.startsWith('end of loan') || lower.startsWith('leih-ende') || lower.startsWith('leihende')) {
    return { fee: null, isLoan: true };
  }
  return { fee: parseCurrency(text, 'fee'), isLoan: false };
}

/** Inverse of `parseCurrency` for a compact English rendering, used in reports. */
export function formatEuros(value: number | null): string {
  if (value === null) return '-';
  if (value >= 1_000_000) return `€${(value / 1_000_000).toFixed(2)}m`;
  if (value >= 1_000) return `€${Math.round(value / 1_000)}k`;
  return `€${value}`;
}
