/**
 * Rounds the exact binary value of `value` to `decimals` places. Only a value
 * that sits exactly halfway goes to the even digit, so 0.0625 -> 0.062 but
 * 2.675 (stored as 2.67499...) -> 2.67.
 */
export function roundToDecimals(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return 0;
  const places = Math.min(20, Math.max(0, Math.trunc(decimals)));
  const magnitude = Math.abs(value);
  if (magnitude >= 1e21) return value;

  const sign = value < 0 ? -1 : 1;
  // toFixed rounds the exact value; it only differs from ties-to-even on exact halves.
  const nearest = Number(magnitude.toFixed(places));
  const expansion = magnitude.toFixed(100);
  const point = expansion.indexOf(".");
  const fraction = expansion.slice(point + 1);
  const exactHalf = fraction[places] === "5" && /^0*$/.test(fraction.slice(places + 1));
  if (!exactHalf) return sign * nearest || 0;

  const truncated = expansion.slice(0, places === 0 ? point : point + 1 + places);
  const lastDigit = Number(truncated[truncated.length - 1]);
  return sign * (lastDigit % 2 === 0 ? Number(truncated) : nearest) || 0;
}

/** numerator / denominator rounded; a zero (or negative) denominator yields 0. */
export function roundedRatio(numerator: number, denominator: number, decimals: number): number {
  if (!(denominator > 0)) return 0;
  return roundToDecimals(numerator / denominator, decimals);
}

/** Trims a form value; blank strings become null. */
export function blankToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
