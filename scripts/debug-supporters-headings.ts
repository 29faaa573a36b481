#!/usr/bin/env tsx

/**
 * Debug script: Inspect heading-by-heading extraction decisions
 *
 * Shows every anchor heading with its status and the fields found, to
 * understand why a supporter is missing from the rendered page.
 *
 * Usage:
 *   npm run debug:headings                  # fetch the configured page
 *   npm run debug:headings -- page.html     # inspect a saved copy
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { loadBuildConfig } from "@/config";
import { fetchSupportersPage, scanSupporterCandidates } from "@/supporters";

async function main() {
  const config = loadBuildConfig();
  const localFile = process.argv[2];

  const html = localFile
    ? readFileSync(localFile, "utf-8")
    : await fetchSupportersPage(config.sourceUrl);
  console.log(`Source: ${localFile ?? config.sourceUrl}\n`);

  const candidates = scanSupporterCandidates(html, { baseUrl: config.baseUrl });
  console.log(`Headings found: ${candidates.length}\n`);
  console.log("=".repeat(80));

  candidates.forEach((candidate, i) => {
    const marker = candidate.status === "accepted" ? "✓" : "❌";
    console.log(`\n[${i + 1}] ${marker} ${candidate.status.toUpperCase()}`);
    console.log(`  name: ${candidate.name || "(empty)"}`);
    console.log(`  node: #${candidate.position}`);
    if (candidate.status === "accepted") {
      console.log(`  industry: ${candidate.industry ?? "(none)"}`);
      console.log(`  link: ${candidate.link ?? "(none)"}`);
      console.log(`  logo: ${candidate.logo ?? "(none)"}`);
    }
  });

  const accepted = candidates.filter((c) => c.status === "accepted").length;
  console.log(`\nAccepted: ${accepted}/${candidates.length}`);
}

main().catch((error) => {
  console.error("Debug failed:", error);
  process.exit(1);
});
