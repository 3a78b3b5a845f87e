import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

import { loadConfig, validateConfig } from '../src/config.js';
import { createBundlerAnalyzer } from '../src/index.js';
import { detectChain } from '../src/utils/helpers.js';
import { toSerializable } from '../src/report/serialize.js';
import { formatBundlerReport } from '../src/report/formatters.js';
import type { Chain } from '../src/types.js';

const CHAINS: readonly Chain[] = ['solana', 'ethereum', 'base', 'bsc', 'shibarium'];

async function main() {
  const [token, chainArg] = process.argv.slice(2);
  if (!token) {
    console.error('Usage: npx tsx scripts/analyze-token.ts <TOKEN_ADDRESS> [chain]');
    process.exit(1);
  }

  const chain = CHAINS.find((c) => c === chainArg) ?? detectChain(token);
  const config = loadConfig();
  const problems = validateConfig(config);
  if (problems.length > 0) {
    console.error(`Configuration errors:\n  ${problems.join('\n  ')}`);
    process.exit(1);
  }

  const analyzer = createBundlerAnalyzer(config);
  analyzer.events.on('stageFailed', (_token, note) => {
    console.log(`  ! ${note.stage}: ${note.message}`);
  });
  analyzer.events.on('bundlesDetected', (_token, clusters) => {
    console.log(`  ${clusters.length} bundle clusters accepted`);
  });

  console.log(`=== Bundle analysis: ${token} (${chain}) ===\n`);

  const report = await analyzer.analyze(token, chain);

  console.log('\n' + formatBundlerReport(report));
  console.log('\n=== JSON ===');
  console.log(JSON.stringify(toSerializable(report), null, 2));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
