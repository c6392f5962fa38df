/**
 * Common value converters for parameters
 */

import type { ValueConverter } from './types.js';

export const toInt: ValueConverter = raw => {
  if (!/^[+-]?\d+$/.test(raw.trim())) {
    throw new Error(`'${raw}' is not a valid integer.`);
  }
  return Number.parseInt(raw, 10);
};

export const toFloat: ValueConverter = raw => {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new Error(`'${raw}' is not a valid float.`);
  }
  return value;
};

