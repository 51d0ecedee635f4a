#!/usr/bin/env tsx

import { parseArgs } from 'util';
import { loadConfig, type DiagnosticsConfig } from './config.js';
import { createClusterClient } from '../cluster/client-factory.js';
import type { ClusterClient } from '../cluster/client-interface.js';
import { buildChecks, runDiagnostics } from '../checks/index.js';
import type { FindingLevel } from '../checks/result.js';
import { formatOutcome, formatSummary } from './report.js';

const LEVELS: readonly FindingLevel[] = ['debug', 'info', 'warning', 'error'];

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: 'diagnostics.yaml' },
      help: { type: 'boolean', short: 'h' },
      level: { type: 'string' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(`
Usage: npx tsx src/runner [options] [command]

Options:
  -c, --config <path>       Path to the diagnostics config file (default: diagnostics.yaml)
  -h, --help                Show this help message
  --level <level>           Lowest finding level to print: debug, info, warning, error

Commands:
  run                       Run all enabled checks (default)
  list                      List the enabled checks

Examples:
  npx tsx src/runner --config diagnostics.yaml
  npx tsx src/runner --level debug run
  npx tsx src/runner list
`);
    process.exit(0);
  }

  const configPath = values.config || 'diagnostics.yaml';
  const [command = 'run'] = positionals;
  const config = loadConfig(configPath);

  const level = values.level ?? config.settings.level;
  if (!isLevel(level)) {
    console.error(`Error: unknown level "${level}"`);
    process.exit(1);
  }

  switch (command) {
    case 'list':
      listChecks(config);
      break;

    case 'run':
      await runChecks(config, level);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run with --help for usage information');
      process.exit(1);
  }
}

function listChecks(config: DiagnosticsConfig): void {
  for (const check of buildChecks(config, {})) {
    console.log(`  ${check.name.padEnd(20)} ${check.description}`);
  }
}

async function runChecks(config: DiagnosticsConfig, level: FindingLevel): Promise<void> {
  let clusterClient: ClusterClient | undefined;
  if (config.cluster) {
    try {
      clusterClient = createClusterClient(config.cluster);
    } catch (err) {
      // Cluster checks report themselves as skipped without a client
      console.error(`Warning: cluster checks disabled: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const checks = buildChecks(config, { clusterClient });
  console.log(`Running ${checks.length} diagnostic check(s)...\n`);

  const summary = await runDiagnostics(checks, {
    onOutcome: outcome => {
      for (const line of formatOutcome(outcome, level)) {
        console.log(line);
      }
    },
  });

  console.log(`\n${formatSummary(summary)}`);

  if (summary.failed > 0) {
    process.exit(1);
  }
}

function isLevel(value: string): value is FindingLevel {
  return LEVELS.some(l => l === value);
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
