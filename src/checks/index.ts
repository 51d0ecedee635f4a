import type { Check, DiagnosticError } from './types.js';
import type { DiagnosticResult } from './result.js';
import type { ClusterClient } from '../cluster/client-interface.js';
import type { DiagnosticsConfig } from '../runner/config.js';
import { NodeConfigCheck } from './node-config.js';
import { MasterConfigCheck } from './master-config.js';
import { ClusterRegistryCheck } from './cluster-registry.js';
import { ClusterRouterCheck } from './cluster-router.js';

export interface CheckDependencies {
  // Absent when no cluster is configured; cluster checks then decline to run
  clusterClient?: ClusterClient;
}

export function buildChecks(config: DiagnosticsConfig, deps: CheckDependencies): Check[] {
  const checks: Check[] = [
    new NodeConfigCheck(config.host.nodeConfig),
    new MasterConfigCheck(config.host.masterConfig),
    new ClusterRegistryCheck(deps.clusterClient),
    new ClusterRouterCheck(deps.clusterClient, {
      routerName: config.router.name,
      namespace: config.router.namespace,
      recencyMs: config.router.recencySeconds * 1000,
      logIdleTimeoutMs: config.router.logIdleTimeoutSeconds * 1000,
    }),
  ];

  const selected = config.settings.checks;
  if (selected.length === 0) {
    return checks;
  }

  const unknown = selected.filter(name => !checks.some(c => c.name === name));
  if (unknown.length > 0) {
    throw new Error(`Unknown check(s): ${unknown.join(', ')}`);
  }
  return checks.filter(c => selected.includes(c.name));
}

export type CheckOutcome =
  | { status: 'ran'; check: Check; result: DiagnosticResult; durationMs: number }
  | { status: 'skipped'; check: Check; reason: DiagnosticError };

export interface RunOptions {
  onOutcome?: (outcome: CheckOutcome) => void;
}

export interface DiagnosticsSummary {
  passed: number;
  failed: number;
  skipped: number;
  outcomes: CheckOutcome[];
}

// Gate and run each check in turn. A check that declines to run is skipped,
// never inspected.
export async function runDiagnostics(checks: Check[], options: RunOptions = {}): Promise<DiagnosticsSummary> {
  const { onOutcome } = options;
  const outcomes: CheckOutcome[] = [];
  let passed = 0;
  let failed = 0;
  let skipped = 0;

  for (const check of checks) {
    let outcome: CheckOutcome;
    const gate = await check.canRun();

    if (!gate.canRun) {
      outcome = { status: 'skipped', check, reason: gate.error };
      skipped++;
    } else {
      const startTime = Date.now();
      const result = await check.inspect();
      outcome = { status: 'ran', check, result, durationMs: Date.now() - startTime };
      if (result.passed()) {
        passed++;
      } else {
        failed++;
      }
    }

    outcomes.push(outcome);
    onOutcome?.(outcome);
  }

  return { passed, failed, skipped, outcomes };
}

export type { Check, CanRunResult } from './types.js';
export type { DiagnosticResult, Finding, FindingLevel } from './result.js';
