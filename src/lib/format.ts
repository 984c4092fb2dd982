export function formatAverage(value: number): string {
  if (!Number.isFinite(value)) return "—";
  return value.toFixed(3);
}

export function formatEra(value: number): string {
  if (!Number.isFinite(value)) return "—";
  return value.toFixed(2);
}

export function formatInnings(value: number): string {
  if (!Number.isFinite(value)) return "—";
  return value.toFixed(1);
}

export function formatOptional(value: string | null | undefined): string {
  return value && value.trim() ? value : "—";
}
