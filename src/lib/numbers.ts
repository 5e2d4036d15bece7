export function isFiniteNum(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Parses a CSV/JSON cell; blank or non-numeric text yields undefined */
export function toNumber(value: unknown): number | undefined {
  if (isFiniteNum(value)) return value;
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : undefined;
}

/** Number of decimal places in a number's shortest representation, exponent form included */
export function decimalPlaces(value: number): number {
  const text = Math.abs(value).toString();
  const [mantissa, exponent] = text.split('e');
  const fraction = mantissa.split('.')[1]?.length ?? 0;
  const exp = exponent ? Number(exponent) : 0;
  return Math.max(0, fraction - exp);
}
