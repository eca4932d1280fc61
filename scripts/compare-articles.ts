/**
 * Evaluate every article in a directory and print a comparison.
 *
 * Usage:
 *   npx tsx scripts/compare-articles.ts [articles-dir]
 *
 * Defaults to scripts/fixtures. Each *.txt file is one article; its first
 * line is used as the title.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { loadEvaluatorConfig } from "../src/lib/config-loader";
import { loadEnvFile } from "../src/lib/env-file";
import { ReasoningLogicEvaluator } from "../src/lib/analyzer/evaluator";
import { formatComparisonSummary } from "../src/lib/analyzer/format-report";
import { extractArticleSections } from "../src/lib/text-utils";

const scriptDir = path.dirname(fileURLToPath(import.meta.url));

function readArticles(dir: string): Record<string, string> {
  const articles: Record<string, string> = {};
  for (const file of fs.readdirSync(dir).filter((f) => f.endsWith(".txt")).sort()) {
    const text = fs.readFileSync(path.join(dir, file), "utf-8");
    const title = extractArticleSections(text).title || file;
    articles[title] = text;
  }
  return articles;
}

async function main(): Promise<void> {
  loadEnvFile(path.resolve(".env"));

  const dir = process.argv[2] ? path.resolve(process.argv[2]) : path.join(scriptDir, "fixtures");
  const articles = readArticles(dir);
  if (Object.keys(articles).length === 0) {
    console.error(`No .txt articles found in ${dir}`);
    process.exit(1);
  }

  const evaluator = new ReasoningLogicEvaluator(loadEvaluatorConfig());
  const results = await evaluator.evaluateMany(articles);

  for (const [title, result] of Object.entries(results)) {
    console.log(`\n${title}`);
    console.log("-".repeat(60));
    result.weaknesses.slice(0, 3).forEach((w) => console.log(`  • ${w}`));
  }

  console.log("\n" + formatComparisonSummary(results));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
