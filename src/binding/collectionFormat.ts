import type { CollectionFormat } from "@/binding/descriptor";

const SEPARATORS: Record<Exclude<CollectionFormat, "multi">, string> = {
  csv: ",",
  ssv: " ",
  tsv: "\t",
  pipes: "|",
};

/**
 * Splits raw fragments into item strings. `multi` fragments are already one
 * item per occurrence; every other format splits the first fragment on its
 * separator, trimming items and dropping empty ones.
 */
export function splitCollection(
  fragments: readonly string[],
  format: CollectionFormat = "csv",
): string[] {
  if (format === "multi") return [...fragments];

  const [raw] = fragments;
  if (raw === undefined) return [];
  return raw
    .split(SEPARATORS[format])
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
