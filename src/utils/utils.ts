export function TryParseInt(value: unknown): number | null {
  if (typeof value === "number" && isFinite(value)) {
    return Math.floor(value);
  }
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

export const formatBytes = (n: number | null) => {
  if (n == null) return "...";
  if (n < 1024) return `${n} B`;
  if (n < 1024 * 1024) return `${(n / 1024).toFixed(1)} KB`;
  return `${(n / (1024 * 1024)).toFixed(2)} MB`;
};

// share of `part` in `whole` as a percentage string, "0%" when whole is 0.
export function formatRatio(part: number, whole: number): string {
  if (whole === 0) {
    return "0%";
  }
  return `${((part / whole) * 100).toFixed(1)}%`;
}
