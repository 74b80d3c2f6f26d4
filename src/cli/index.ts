#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config/index.js";
import { createModelGateway } from "../core/gateway/modelGateway.js";
import { Analyzer } from "../core/pipeline/analyzer.js";
import { EmptyInputError } from "../core/errors.js";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function main(): Promise<void> {
  const fromArgs = process.argv.slice(2).join(" ");
  const text = fromArgs || (process.stdin.isTTY ? "" : await readStdin());

  const config = loadConfig();
  const analyzer = new Analyzer(createModelGateway(config.gateway));

  console.log("═══════════════════════════════════════════════════════");
  console.log("  AI Misinformation Toolkit");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Mode:     ${analyzer.mode}`);
  console.log(`  Provider: ${analyzer.providerName}`);
  console.log("───────────────────────────────────────────────────────\n");

  try {
    const result = await analyzer.analyze(text);

    console.log("── 🚩 Red Flag Analysis ────────────────────────────");
    console.log(result.redFlags);
    console.log("\n── 📌 Factual Summary ──────────────────────────────");
    console.log(result.summary);
    console.log("\n── 🎓 Educational Insights ─────────────────────────");
    console.log(result.insights);
  } catch (error) {
    if (error instanceof EmptyInputError) {
      console.error(`⚠️  ${error.message}`);
      console.error('Usage: misinfo-toolkit "text to analyze"   (or pipe text on stdin)');
      process.exit(1);
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`\n❌ Analysis failed: ${message}`);
  process.exit(1);
});
