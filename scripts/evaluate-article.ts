/**
 * Evaluate one article and print the summary and component details.
 *
 * Usage:
 *   npx tsx scripts/evaluate-article.ts [article-file] [title]
 *
 * Defaults to scripts/fixtures/semiconductor-earnings.txt. The title falls
 * back to the first line of the article. Reads .env from the working
 * directory when present.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { loadEvaluatorConfig } from "../src/lib/config-loader";
import { loadEnvFile } from "../src/lib/env-file";
import { clearDebugLog } from "../src/lib/analyzer/debug";
import { ReasoningLogicEvaluator } from "../src/lib/analyzer/evaluator";
import { formatComponentDetails, formatEvaluationSummary } from "../src/lib/analyzer/format-report";
import { extractArticleSections } from "../src/lib/text-utils";

const scriptDir = path.dirname(fileURLToPath(import.meta.url));
const defaultArticle = path.join(scriptDir, "fixtures", "semiconductor-earnings.txt");

async function main(): Promise<void> {
  loadEnvFile(path.resolve(".env"));
  await clearDebugLog();

  const articlePath = process.argv[2] ? path.resolve(process.argv[2]) : defaultArticle;
  if (!fs.existsSync(articlePath)) {
    console.error(`Article file not found: ${articlePath}`);
    process.exit(1);
  }

  const articleText = fs.readFileSync(articlePath, "utf-8");
  const title = process.argv[3] || extractArticleSections(articleText).title || path.basename(articlePath);

  const config = loadEvaluatorConfig();
  const evaluator = new ReasoningLogicEvaluator(config);

  console.log("=".repeat(60));
  console.log(`Evaluating "${title}" with ${config.modelName}`);
  console.log("=".repeat(60));

  const result = await evaluator.evaluate(articleText, title);

  console.log("\n" + formatEvaluationSummary(result));
  console.log("=".repeat(60));
  console.log("Detailed Component Analysis");
  console.log("=".repeat(60));
  console.log(formatComponentDetails(result));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
