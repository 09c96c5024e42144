/**
 * Order sizing - entry sizes snapped to the instrument's lot grid
 */

import type { Instrument } from '../../types/market.types.js';

function decimalsOf(step: number): number {
  const text = step.toString();
  const exponent = /e-(\d+)$/.exec(text);
  if (exponent) {
    const [mantissa] = text.split('e');
    const [, fraction] = mantissa.split('.');
    return Number(exponent[1]) + (fraction ? fraction.length : 0);
  }
  const [, fraction] = text.split('.');
  return fraction ? fraction.length : 0;
}

function roundToStep(value: number, step: number): number {
  return Number(value.toFixed(decimalsOf(step)));
}

/**
 * Size of one entry order: `orderSize` (or one lot) rounded down to a lot
 * multiple, raised to the smallest lot multiple at or above `minOrderSize`.
 */
export function entryOrderSize(instrument: Instrument): number {
  const { lotSize, minOrderSize } = instrument;
  const requested = instrument.orderSize ?? lotSize;

  // Tolerance keeps 0.003 / 0.001 from flooring to 2
  const lots = Math.floor(requested / lotSize + 1e-9);
  const size = roundToStep(lots * lotSize, lotSize);
  if (size >= minOrderSize) {
    return size;
  }

  const minimumLots = Math.ceil(minOrderSize / lotSize - 1e-9);
  return roundToStep(minimumLots * lotSize, lotSize);
}

export function roundPrice(price: number, tickSize: number): number {
  return roundToStep(Math.round(price / tickSize) * tickSize, tickSize);
}
