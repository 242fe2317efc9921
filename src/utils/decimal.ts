/** A decimal value held as integer units at a power-of-ten scale: `units / 10^scale`. */
export interface ScaledDecimal {
  units: bigint;
  scale: number;
}

const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d+))?(?:e([+-]\d+))?$/;

/**
 * Reads a number by its shortest decimal rendering, so `1.1` becomes 11 at scale 1
 * instead of the nearest binary float.
 */
export function toScaledDecimal(value: number): ScaledDecimal {
  const match = Number.isFinite(value) ? DECIMAL_PATTERN.exec(String(value)) : null;
  if (!match) {
    throw new RangeError(`Not a finite decimal: ${value}`);
  }

  const sign = match[1] ?? '';
  const whole = match[2] ?? '0';
  const fraction = match[3] ?? '';
  const exponent = Number(match[4] ?? '0');

  let units = BigInt(`${sign}${whole}${fraction}`);
  let scale = fraction.length - exponent;
  if (scale < 0) {
    units *= 10n ** BigInt(-scale);
    scale = 0;
  }
  return { units, scale };
}

function rescale(value: ScaledDecimal, scale: number): bigint {
  return value.units * 10n ** BigInt(scale - value.scale);
}

/**
 * Exact test of `(value - base) / base > threshold` on the decimal values of the
 * inputs. `base` must not be zero.
 */
export function relativeGapExceeds(value: number, base: number, threshold: number): boolean {
  const v = toScaledDecimal(value);
  const b = toScaledDecimal(base);
  const t = toScaledDecimal(threshold);
  if (b.units === 0n) {
    throw new RangeError('Relative gap against a zero base');
  }

  const scale = Math.max(v.scale, b.scale);
  const diff = rescale(v, scale) - rescale(b, scale);
  const baseUnits = rescale(b, scale);

  // diff / base > t.units / 10^t.scale, cross-multiplied with the sign of base
  const left = diff * 10n ** BigInt(t.scale);
  const right = t.units * baseUnits;
  return baseUnits > 0n ? left > right : left < right;
}
