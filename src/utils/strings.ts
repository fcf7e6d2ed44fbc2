import type { BoundValue, ScalarValue } from "../types.js";

export function truncateMiddle(text: string | undefined | null, limit: number): string {
  if (!text || text.length <= limit) return text ?? "";

  const startLength = Math.floor(limit * 0.6);
  const endLength = limit - startLength - 5;

  const start = text.slice(0, startLength);
  const end = text.slice(-endLength);
  return `${start} ... ${end}`;
}

function formatScalar(value: ScalarValue): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** Renders bound values for logs, e.g. `"left", 2.5, [1, 2]`. */
export function formatValues(values: readonly BoundValue[]): string {
  return values
    .map((value) =>
      Array.isArray(value) ? `[${value.map(formatScalar).join(", ")}]` : formatScalar(value)
    )
    .join(", ");
}
