/**
 * Human-readable output
 *
 * Every formatter returns lines; commands print them. Id lists are always
 * printed in full.
 */

import type { ActionPlan, ConfigBundle, ProfileSummary, StoredBundle, TeardownOutcome } from '@slotwarden/ipc';
import type { CheckReport, DeployBatchResult, DeployResult, DiscoveredResources } from '@slotwarden/engine';

export interface Style {
  green(s: string): string;
  red(s: string): string;
  yellow(s: string): string;
  cyan(s: string): string;
  dim(s: string): string;
}

const ansi = (code: number) => (s: string) => `\x1b[${code}m${s}\x1b[0m`;

export const COLOR: Style = { green: ansi(32), red: ansi(31), yellow: ansi(33), cyan: ansi(36), dim: ansi(2) };
const identity = (s: string) => s;
export const PLAIN: Style = { green: identity, red: identity, yellow: identity, cyan: identity, dim: identity };

export function styleFor(stream: { isTTY?: boolean } = process.stdout): Style {
  return stream.isTTY ? COLOR : PLAIN;
}

function list(ids: readonly number[]): string {
  return ids.length === 0 ? '-' : ids.join(', ');
}

export function maskSecret(value: string): string {
  if (value.length <= 10) return '****';
  return `${value.slice(0, 6)}…${value.slice(-4)}`;
}

// ---- deploy ----

export function formatPlan(plan: ActionPlan, s: Style = PLAIN): string[] {
  const lines = [
    `To start:        ${list(plan.toStart)}`,
    `Already running: ${list(plan.alreadyRunning)}`,
  ];
  if (plan.orphaned.length > 0) {
    lines.push(s.yellow(`Orphaned:        ${list(plan.orphaned)}`));
    lines.push(s.dim('  Orphaned instances are left alone; remove them with `slotwarden diagnose`.'));
  }
  if (plan.unownedRequested.length > 0) {
    lines.push(s.yellow(`Not owned:       ${list(plan.unownedRequested)}`));
  }
  return lines;
}

export function formatDeployResult(result: DeployResult, s: Style = PLAIN): string {
  if (!result.ok) return `${s.red('✗')} slot ${result.slotId}: ${result.error.message}`;
  const { instance } = result;
  if (!result.started) return `${s.dim('•')} slot ${instance.slotId}: already running (${instance.name})`;
  const ports = instance.ports.join(', ');
  return `${s.green('✓')} slot ${instance.slotId}: started ${instance.name} [${instance.subnet ?? 'no subnet'}; ports ${ports}]`;
}

export function formatDeployBatch(batch: DeployBatchResult, s: Style = PLAIN): string[] {
  const lines = [
    '',
    `Started:         ${batch.started.length}`,
    `Already running: ${batch.alreadyRunning.length}`,
    `Failed:          ${batch.failed.length}`,
  ];
  if (batch.skipped.length > 0) lines.push(`Skipped:         ${batch.skipped.length} (cancelled)`);
  if (batch.failed.length > 0) {
    lines.push('', s.red(`Failed slots: ${batch.failed.map((f) => f.slotId).join(', ')}`));
    for (const f of batch.failed) lines.push(`  ${f.slotId}: [${f.error.code}] ${f.error.message}`);
  }
  if (batch.skipped.length > 0) lines.push(s.yellow(`Skipped slots: ${batch.skipped.join(', ')}`));
  return lines;
}

// ---- check ----

export function formatCheckReport(report: CheckReport, s: Style = PLAIN): string[] {
  const scope = report.market ? `${report.chain}/${report.market}` : report.chain;
  const coverage = report.coverage === null ? 'n/a' : `${report.coverage}%`;
  const lines = [
    `Wallet:   ${report.wallet}`,
    `Scope:    ${scope} (profile ${report.profile})`,
    `Owned:    ${report.ownedCount}`,
    `Running:  ${report.runningCount} (${coverage})`,
    '',
    `Running slots:     ${list(report.running)}`,
    `Not running slots: ${report.notRunning.length === 0 ? '-' : s.red(list(report.notRunning))}`,
  ];
  if (report.orphaned.length > 0) lines.push(s.yellow(`Orphaned slots:    ${list(report.orphaned)}`));
  if (report.containersWithoutSessions.length > 0) {
    lines.push(`Containers without sessions: ${list(report.containersWithoutSessions)}`);
  }
  if (report.sessionsWithoutContainers.length > 0) {
    lines.push(s.yellow(`Sessions without containers: ${list(report.sessionsWithoutContainers)}`));
  }
  if (report.unparsed.length > 0) {
    lines.push(s.yellow(`Unrecognized names: ${report.unparsed.join(', ')}`));
  }
  if (report.deployHint) lines.push('', 'To start the missing slots:', `  ${s.cyan(report.deployHint)}`);
  return lines;
}

// ---- diagnose ----

export function formatDiscovery(found: DiscoveredResources, s: Style = PLAIN): string[] {
  const lines: string[] = [];
  const section = (title: string, rows: string[]) => {
    if (rows.length === 0) return;
    lines.push(`${title} (${rows.length}):`, ...rows.map((r) => `  ${r}`));
  };
  section('Containers', found.containers.map((c) => `${c.name} ${s.dim(`[${c.state}]`)}`));
  section('Networks', found.networks.map((n) => `${n.name}${n.subnet ? ` ${s.dim(n.subnet)}` : ''}`));
  section('Sessions', found.sessions.map((x) => `${x.pid}.${x.name}`));
  section('Workspaces', found.workspaces.map((w) => w.path));
  if (found.unparsed.length > 0) {
    section('Unrecognized (left alone)', found.unparsed.map((n) => s.yellow(n)));
  }
  lines.push(
    `Subnets in use: ${found.subnets.used.length === 0 ? '-' : found.subnets.used.map((o) => `.${o}`).join(' ')}`,
    `Next available: ${found.subnets.available.join(', ') || '-'}`,
  );
  return lines;
}

export function formatTeardownOutcome(outcome: TeardownOutcome, s: Style = PLAIN): string {
  const label = `${outcome.handle.kind} ${outcome.handle.name}`;
  const steps = outcome.steps.length > 0 ? ` (${outcome.steps.join(' → ')})` : '';
  switch (outcome.status) {
    case 'failed':
      return `${s.red('✗')} ${label}: ${outcome.failure ? `${outcome.failure.step} failed: ${outcome.failure.reason}` : 'failed'}${steps}`;
    case 'skipped':
      return `${s.yellow('-')} ${label}: skipped${outcome.advisory ? ` (${outcome.advisory})` : ''}`;
    case 'planned':
      return `${s.dim('?')} ${label}: would be removed`;
    default:
      return `${s.green('✓')} ${label}: ${outcome.status.replace('_', ' ')}${steps}`;
  }
}

export function formatTeardownSummary(outcomes: readonly TeardownOutcome[], s: Style = PLAIN): string[] {
  const count = (status: TeardownOutcome['status']) => outcomes.filter((o) => o.status === status).length;
  const failed = outcomes.filter((o) => o.status === 'failed');
  const lines = [
    '',
    `Removed: ${count('removed')}  Stopped: ${count('stopped')}  Killed: ${count('force_killed')}  Failed: ${failed.length}  Skipped: ${count('skipped')}`,
  ];
  const advisories = new Set(failed.map((o) => o.advisory).filter((a): a is string => a !== undefined));
  for (const advisory of advisories) lines.push(s.yellow(advisory));
  return lines;
}

// ---- profiles ----

export function formatProfiles(profiles: readonly ProfileSummary[], s: Style = PLAIN): string[] {
  if (profiles.length === 0) return ['No profiles.'];
  return profiles.map((p) => {
    const marks = [p.isDefault ? 'default' : '', p.isLastUsed ? 'last used' : ''].filter(Boolean).join(', ');
    const suffix = marks ? ` ${s.cyan(`(${marks})`)}` : '';
    const bundles = `${p.bundleCount} bundle${p.bundleCount === 1 ? '' : 's'}`;
    return `${p.name}${suffix} ${s.dim(`- ${bundles}`)}${p.description ? ` ${s.dim(p.description)}` : ''}`;
  });
}

export function formatBundle(bundle: ConfigBundle): string[] {
  const lines = [
    `Wallet:       ${bundle.walletAddress}`,
    `Signer:       ${bundle.signerAddress}`,
    `Signer key:   ${maskSecret(bundle.signerPrivateKey)}`,
    `Source RPC:   ${bundle.sourceRpcUrl}`,
  ];
  if (bundle.ledgerRpcUrl) lines.push(`Ledger RPC:   ${bundle.ledgerRpcUrl}`);
  if (bundle.telegramChatId) lines.push(`Telegram:     ${bundle.telegramChatId}`);
  if (bundle.telegramReportingUrl) lines.push(`Reporting:    ${bundle.telegramReportingUrl}`);
  if (bundle.maxStreamPoolSize !== undefined) lines.push(`Stream pool:  ${bundle.maxStreamPoolSize}`);
  if (bundle.connectionRefreshInterval !== undefined) {
    lines.push(`Refresh:      ${bundle.connectionRefreshInterval}s`);
  }
  for (const key of Object.keys(bundle.extraEnv).sort()) lines.push(`${key}=${bundle.extraEnv[key]}`);
  return lines;
}

export function formatStoredBundles(bundles: readonly StoredBundle[]): string[] {
  if (bundles.length === 0) return ['  No configuration stored. Run `slotwarden configure`.'];
  const lines: string[] = [];
  for (const b of bundles) {
    lines.push(`  ${b.chain}/${b.market} (updated ${b.updatedAt})`, ...formatBundle(b.bundle).map((l) => `    ${l}`));
  }
  return lines;
}
