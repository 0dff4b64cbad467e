// IEEE 754 binary16 conversion; DataView has no float16 accessors on Node 20.

function roundEven(x: number): number {
  const f = Math.floor(x);
  const d = x - f;
  if (d > 0.5) return f + 1;
  if (d < 0.5) return f;
  return f % 2 === 0 ? f : f + 1;
}

/** Round a number to the nearest half-precision value and return its bits. */
export function toHalfBits(value: number): number {
  if (Number.isNaN(value)) return 0x7e00;
  const sign = value < 0 || Object.is(value, -0) ? 0x8000 : 0;
  const v = Math.abs(value);
  if (v === 0) return sign;
  // 65520 is halfway between 65504 and 65536 and rounds to even, i.e. overflows.
  if (v >= 65520) return sign | 0x7c00;
  if (v < 2 ** -14) {
    // Subnormal range, in units of 2^-24. A result of 1024 carries into the
    // smallest normal exponent, which the bit layout already expresses.
    return sign | roundEven(v * 2 ** 24);
  }
  let exp = Math.floor(Math.log2(v));
  if (2 ** exp > v) exp--;
  else if (2 ** (exp + 1) <= v) exp++;
  let mant = roundEven((v / 2 ** exp - 1) * 1024);
  if (mant === 1024) {
    mant = 0;
    exp++;
  }
  if (exp > 15) return sign | 0x7c00;
  return sign | ((exp + 15) << 10) | mant;
}

export function fromHalfBits(half: number): number {
  const exp = (half >> 10) & 0x1f;
  const mant = half & 0x3ff;
  let val: number;
  if (exp === 0) {
    val = mant * 2 ** -24;
  } else if (exp !== 31) {
    val = (mant + 1024) * 2 ** (exp - 25);
  } else {
    val = mant === 0 ? Infinity : NaN;
  }
  return half & 0x8000 ? -val : val;
}

/** Whether `value` survives a trip through half precision unchanged. */
export function isHalfExact(value: number): boolean {
  if (Number.isNaN(value)) return true;
  return Object.is(fromHalfBits(toHalfBits(value)), value);
}

export function isSingleExact(value: number): boolean {
  if (Number.isNaN(value)) return true;
  return Object.is(Math.fround(value), value);
}
