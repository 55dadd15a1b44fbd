/**
 * Process a scanned invoice
 * =========================
 * Loads a small catalog, runs one image or PDF through the whole pipeline and
 * prints what was extracted and validated.
 *
 *   OPENAI_API_KEY=... npx tsx examples/01-process-invoice.ts ./scan.pdf
 */

import { fileURLToPath } from "node:url";
import { createProcessingEngine } from "../src/index.js";

async function main(): Promise<void> {
  const path = process.argv[2];
  if (!path) {
    console.error("usage: 01-process-invoice.ts <image-or-pdf>");
    process.exitCode = 1;
    return;
  }

  const engine = createProcessingEngine({
    config: { defaultModel: "openai:gpt-4o-mini", defaultSplittingStrategy: "whole_document" },
  });
  await engine.catalog.loadCatalogFile(fileURLToPath(new URL("./catalog.json", import.meta.url)));

  const result = await engine.process({
    sourceType: "local",
    sourceReference: path,
    expectedNature: "financial",
  });

  console.log(`Job ${result.job.id}: ${result.job.status}`);
  for (const doc of result.documents) {
    console.log(`\n#${doc.documentIndex} ${doc.documentTypeCode ?? "unclassified"} (${doc.overallConfidence})`);
    console.log(JSON.stringify(doc.extractedFields, null, 2));
    for (const check of doc.validationResults) {
      console.log(`  ${check.passed ? "ok  " : "FAIL"} ${check.validatorName} ${check.message}`);
    }
  }
  console.log(`\nTokens: ${result.job.totalTokensUsed}  Cost: $${result.job.totalCostUsd.toFixed(4)}`);

  await engine.shutdown();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
