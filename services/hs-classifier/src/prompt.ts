import { readFileSync } from "node:fs";
import path from "node:path";

import type { ReferenceTable } from "./reference.js";

const PLACEHOLDER = "{{REFERENCE_DOCUMENT}}";

export function loadPromptTemplate(assetDir: string): string {
  const template = readFileSync(path.join(assetDir, "prompts", "classification.txt"), "utf-8");
  if (!template.includes(PLACEHOLDER)) {
    throw new Error(`Prompt template is missing the ${PLACEHOLDER} placeholder`);
  }
  return template;
}

export function buildClassificationPrompt(template: string, table: ReferenceTable): string {
  // split/join so "$" sequences in the table are not read as replacement patterns
  return template.split(PLACEHOLDER).join(table.document).trimEnd();
}
