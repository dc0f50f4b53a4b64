import { describe, expect, it } from "vitest";

import { SERVICE_ROOT } from "../src/config.js";
import { buildClassificationPrompt, loadPromptTemplate } from "../src/prompt.js";
import { findEntry, loadReferenceTable, parseReferenceTable } from "../src/reference.js";

const header = "HTS_Code,Description,Unit_of_Quantity,Rate_General,Rate_Special,Rate_Column_2";

describe("reference table", () => {
  const table = loadReferenceTable(SERVICE_ROOT);

  it("loads every line of the bundled document", () => {
    expect(table.entries).toHaveLength(38);
    expect(table.document.startsWith(header)).toBe(true);
  });

  it("splits the statistical suffix from the code", () => {
    expect(findEntry(table, "0901.21.00", "49")).toEqual({
      htsCode: "0901.21.00.49",
      hsCode: "0901.21.00",
      statSuffix: "49",
      description:
        "Coffee, roasted: Not decaffeinated: In retail containers weighing 2 kg or less: Other: Other",
      unit: "kg",
      rateGeneral: "Free 1/",
      rateSpecial: "",
      rateColumn2: "Free",
    });
  });

  it("returns undefined for unknown lines", () => {
    expect(findEntry(table, "0901.21.00", "99")).toBeUndefined();
  });

  it("rejects malformed codes", () => {
    const document = `${header}\n0901.21.00.49,"Coffee",kg,Free,,Free\n0901.21,"Broken",kg,Free,,Free\n`;

    expect(() => parseReferenceTable(document)).toThrow(/^Invalid HS reference row 3: /);
  });
});

describe("classification prompt", () => {
  it("embeds the reference document in place of the placeholder", () => {
    const table = parseReferenceTable(`${header}\n0903.00.00.00,"Maté $&",kg,"Free 1/","","10%"\n`);
    const prompt = buildClassificationPrompt(loadPromptTemplate(SERVICE_ROOT), table);

    expect(prompt).toContain(`${header}\n0903.00.00.00,"Maté $&",kg,"Free 1/","","10%"`);
    expect(prompt).not.toContain("{{REFERENCE_DOCUMENT}}");
    expect(prompt.endsWith("Begin your response with { now.")).toBe(true);
  });

  it("fails when the template file is missing", () => {
    expect(() => loadPromptTemplate(`${SERVICE_ROOT}/data`)).toThrow();
  });
});
