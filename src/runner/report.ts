import type { CheckOutcome, DiagnosticsSummary } from '../checks/index.js';
import { LEVEL_ORDER, describeError, renderMessage, type Finding, type FindingLevel } from '../checks/result.js';

const LEVEL_LABELS: Record<FindingLevel, string> = {
  debug: 'Debug',
  info: 'Info',
  warning: 'Warning',
  error: 'Error',
};

export function formatFinding(finding: Finding): string[] {
  const lines = [`[${LEVEL_LABELS[finding.level]}] ${finding.code}`];
  for (const line of renderMessage(finding.message).trim().split('\n')) {
    lines.push(`    ${line}`);
  }
  return lines;
}

export function formatOutcome(outcome: CheckOutcome, minLevel: FindingLevel): string[] {
  if (outcome.status === 'skipped') {
    return [`  - ${outcome.check.name}: skipped (${outcome.reason.message.trim()})`];
  }

  const { result, durationMs } = outcome;
  const icon = result.passed() ? '✓' : '✗';
  const lines = [`  ${icon} ${result.name} (${durationMs}ms)`];

  for (const finding of result.findings) {
    if (LEVEL_ORDER[finding.level] < LEVEL_ORDER[minLevel]) continue;
    lines.push(...formatFinding(finding).map(line => `    ${line}`));
    if (finding.cause !== undefined && process.env.DEBUG_DIAGNOSTICS) {
      lines.push(`        cause: ${describeError(finding.cause)}`);
    }
  }
  return lines;
}

export function formatSummary(summary: DiagnosticsSummary): string {
  return `${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped`;
}
