const SYMBOL_BEFORE = /[$£€¥]\s*([0-9]+(?:[.,][0-9]{1,2})?)/g;
const SYMBOL_AFTER = /([0-9]+(?:[.,][0-9]{1,2})?)\s*[$£€¥]/g;
// 1-3 digit numbers so years and long ids are not read as amounts
const STANDALONE = /\b([0-9]{1,3}(?:[.,][0-9]{2})?)(?:\s|$|[^0-9])/g;

const STANDALONE_MAX = 100000;

function collect(text: string, pattern: RegExp, accept: (value: number) => boolean): number[] {
  const candidates: number[] = [];
  for (const match of text.matchAll(pattern)) {
    const value = parseFloat(match[1].replace(',', '.'));
    if (Number.isFinite(value) && accept(value)) {
      candidates.push(value);
    }
  }
  return candidates;
}

/**
 * Extracts the largest amount found in free text such as an OCR'd receipt.
 *
 * Amounts next to a currency symbol ($ £ € ¥, before or after) win. Only when
 * none exist are bare numbers of up to three digits considered. Returns 0 when
 * nothing matches.
 */
export function extractAmount(text: string): number {
  const withCurrency = [
    ...collect(text, SYMBOL_BEFORE, value => value > 0),
    ...collect(text, SYMBOL_AFTER, value => value > 0),
  ];

  if (withCurrency.length > 0) {
    return Math.max(...withCurrency);
  }

  const standalone = collect(text, STANDALONE, value => value > 0 && value < STANDALONE_MAX);
  if (standalone.length > 0) {
    return Math.max(...standalone);
  }

  return 0;
}

/** `$1,234.50` style, always two decimals. */
export function formatAmount(amount: number, symbol: string = '$'): string {
  const formatted = amount.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return `${symbol}${formatted}`;
}

/** Rounds up to a whole unit: 12.01 -> `$13`. */
export function formatAmountNoDecimals(amount: number, symbol: string = '$'): string {
  const formatted = Math.ceil(amount).toLocaleString('en-US', {
    maximumFractionDigits: 0,
  });
  return `${symbol}${formatted}`;
}
