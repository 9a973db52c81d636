// src/utils/sequenceNumber.ts

/** `<PREFIX>-<YYYY>-<6-digit sequence>`, e.g. WAR-2024-000042. */
export function formatSequenceNumber(
  prefix: "WAR" | "RPR" | "BATCH",
  year: number,
  sequence: number,
): string {
  return `${prefix}-${year}-${String(sequence).padStart(6, "0")}`;
}
