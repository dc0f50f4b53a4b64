import { readFileSync } from "node:fs";
import path from "node:path";
import { parse as csvParse } from "csv-parse/sync";
import { z } from "zod";

const rowSchema = z.object({
  HTS_Code: z.string().regex(/^\d{4}\.\d{2}\.\d{2}\.\d{2}$/),
  Description: z.string(),
  Unit_of_Quantity: z.string(),
  Rate_General: z.string(),
  Rate_Special: z.string(),
  Rate_Column_2: z.string(),
});

export interface ReferenceEntry {
  /** Full ten-digit line, e.g. 0901.21.00.49 */
  htsCode: string;
  hsCode: string;
  statSuffix: string;
  description: string;
  unit: string;
  rateGeneral: string;
  rateSpecial: string;
  rateColumn2: string;
}

export interface ReferenceTable {
  entries: ReferenceEntry[];
  /** The CSV exactly as stored; this is what the prompt embeds. */
  document: string;
}

export function parseReferenceTable(document: string): ReferenceTable {
  const rows: unknown[] = csvParse(document, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });

  const entries = rows.map((row, index) => {
    const parsed = rowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Invalid HS reference row ${index + 2}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    const { HTS_Code: htsCode } = parsed.data;
    return {
      htsCode,
      hsCode: htsCode.slice(0, 10),
      statSuffix: htsCode.slice(11),
      description: parsed.data.Description,
      unit: parsed.data.Unit_of_Quantity,
      rateGeneral: parsed.data.Rate_General,
      rateSpecial: parsed.data.Rate_Special,
      rateColumn2: parsed.data.Rate_Column_2,
    };
  });

  return { entries, document: document.trim() };
}

export function loadReferenceTable(assetDir: string): ReferenceTable {
  const filePath = path.join(assetDir, "data", "hs-code-reference.csv");
  return parseReferenceTable(readFileSync(filePath, "utf-8"));
}

export function findEntry(
  table: ReferenceTable,
  hsCode: string,
  statSuffix: string,
): ReferenceEntry | undefined {
  return table.entries.find((entry) => entry.hsCode === hsCode && entry.statSuffix === statSuffix);
}
