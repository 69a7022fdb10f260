//fixed-point money arithmetic on bigint micro-units
//no floating point is allowed in the cost path
import type { Micro } from '../models/index.js';

export const MICRO_PER_UNIT = 1_000_000n;
export const MICRO_PER_CENT = 10_000n;
//unit costs carry 4 decimal places
export const UNIT_COST_QUANTUM = 100n;
export const UNIT_COST_PLACES = 4;

const AMOUNT_PATTERN = /^(-?)(\d*)(?:\.(\d*))?$/;

//parse an extracted amount ("1,200.50", "$12", 12.5) into micro-units; undefined when unusable
export function parseAmount(value: unknown): Micro | undefined {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return undefined;
    text = value.toFixed(7);
  } else if (typeof value === 'string') {
    text = value.replace(/[\s$,]/g, '');
  } else {
    return undefined;
  }

  const m = AMOUNT_PATTERN.exec(text);
  if (!m) return undefined;
  const [, sign = '', whole = '', frac = ''] = m;
  if (whole === '' && frac === '') return undefined;

  const padded = frac.padEnd(7, '0');
  let micro = BigInt(whole || '0') * MICRO_PER_UNIT + BigInt(padded.slice(0, 6));
  //round half-up on the seventh fractional digit
  if (Number(padded[6]) >= 5) micro += 1n;
  return sign === '-' ? -micro : micro;
}

//integer division rounding half away from zero
export function roundDiv(numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) throw new RangeError('denominator must be positive');
  const quotient = numerator / denominator, remainder = numerator % denominator;
  const twice = (remainder < 0n ? -remainder : remainder) * 2n;
  if (twice >= denominator) return quotient + (numerator < 0n ? -1n : 1n);
  return quotient;
}

export function roundToPlaces(micro: Micro, places: number): Micro {
  const quantum = 10n ** BigInt(6 - places);
  return roundDiv(micro, quantum) * quantum;
}

export function formatAmount(micro: Micro, places = 2): string {
  const rounded = roundToPlaces(micro, places);
  const negative = rounded < 0n, abs = negative ? -rounded : rounded;
  const whole = (abs / MICRO_PER_UNIT).toString();
  const frac = (abs % MICRO_PER_UNIT).toString().padStart(6, '0').slice(0, places);
  return `${negative ? '-' : ''}${whole}${places > 0 ? `.${frac}` : ''}`;
}

export function sumMicro(values: Iterable<Micro>): Micro {
  let total = 0n;
  for (const v of values) total += v;
  return total;
}

export function absMicro(value: Micro): Micro {
  return value < 0n ? -value : value;
}
