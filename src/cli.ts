#!/usr/bin/env node
/**
 * CLI entry point to run one crawl task from a JSON config file.
 *
 * Usage:
 *   product-explorer <config.json> [--verbose]
 *
 * Provider keys are read from the environment (or a .env file):
 *   ANTHROPIC_API_KEY, OPENAI_API_KEY, GOOGLE_API_KEY
 */
import 'dotenv/config';
import { loadTaskConfig } from './config/index.js';
import { runCrawlTask } from './runner/index.js';

const USAGE = 'Usage: product-explorer <config.json> [--verbose]';

async function main(argv: string[]): Promise<number> {
  const args = argv.filter((arg) => !arg.startsWith('--'));
  if (argv.includes('--verbose')) {
    process.env.LOG_LEVEL = 'debug';
  }

  const configPath = args[0];
  if (!configPath || argv.includes('--help')) {
    console.error(USAGE);
    return 1;
  }

  const config = await loadTaskConfig(configPath);
  console.log(`\n[product-explorer] Crawling ${config.url} (${config.aiProvider}/${config.aiModel})`);

  const result = await runCrawlTask(config);
  if (!result.success || !result.data) {
    console.error(`[product-explorer] Crawl failed: ${result.error?.code ?? 'UNKNOWN'} ${result.error?.message ?? ''}`);
    return 1;
  }

  const { results, summary, tree, rawLocation, finalLocation, stopReason } = result.data;

  console.log('\n--- Products ---');
  for (const product of results.products) {
    console.log(`  ${product.productName}  ${product.url}`);
  }

  console.log('\n--- Tree ---');
  console.log(tree);

  console.log('\n--- Summary ---');
  console.log(`  Stop reason:      ${stopReason ?? 'unknown'}`);
  console.log(`  Pages processed:  ${summary.pagesProcessed}`);
  console.log(`  Total nodes:      ${summary.totalNodes}`);
  console.log(`  Products found:   ${summary.productsFound} (${summary.productsAfterDedup} after dedup)`);
  console.log(`  Fetch failures:   ${summary.fetchFailures}`);
  console.log(`  AI calls:         ${summary.aiCalls}`);
  console.log(`  Duration:         ${(summary.durationMs / 1000).toFixed(1)}s`);
  console.log(`\n  Raw results:      ${rawLocation}`);
  console.log(`  Final results:    ${finalLocation}`);
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[product-explorer] Crawl failed:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
