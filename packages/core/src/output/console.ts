import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { ProviderFailedEvent, ProviderSkippedEvent } from '@claimcheck/search';
import type {
  CheckCachedEvent,
  CheckCompleteEvent,
  CheckStartEvent,
  ClaimResolvedEvent,
  ClaimStateEvent,
  ClaimsExtractedEvent,
  FactCheckEngine,
} from '../pipeline/engine.js';
import type { Reliability, VerdictStatus } from '../verification/types.js';

export interface ConsoleReporterOptions {
  /** Also print state changes, explanations and provider activity. */
  verbose?: boolean;
  /** Default: chalk's own terminal detection. */
  color?: boolean;
  /** Line sink (default: stderr). */
  write?: (line: string) => void;
}

const STATUS_ICON: Record<VerdictStatus, string> = {
  verified: '✓',
  false: '✗',
  unverifiable: '?',
};

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Render engine (and, when verbose, router) events as progress lines.
 * Returns a function that detaches every listener.
 */
export function attachConsoleReporter(engine: FactCheckEngine, options: ConsoleReporterOptions = {}): () => void {
  const c: ChalkInstance = options.color === undefined
    ? chalk
    : new Chalk({ level: options.color ? 1 : 0 });
  const write = options.write ?? ((line: string) => { process.stderr.write(`${line}\n`); });
  const verbose = options.verbose ?? false;

  const statusColor = (status: VerdictStatus): ChalkInstance =>
    status === 'verified' ? c.green : status === 'false' ? c.red : c.yellow;
  const reliabilityColor = (reliability: Reliability): ChalkInstance =>
    reliability === 'high' ? c.green : reliability === 'low' ? c.red : c.yellow;

  const onStart = (event: CheckStartEvent) => {
    write(`${c.cyan.bold('claimcheck')}${c.dim(` | ${event.mode} check ${event.reportId}`)}`);
  };

  const onCached = (event: CheckCachedEvent) => {
    const minutes = Math.floor(event.ageMs / 60_000);
    write(`${c.dim('cached')} ${event.report.id} ${c.dim(`(${minutes} min old)`)}`);
  };

  const onExtracted = (event: ClaimsExtractedEvent) => {
    const checking = event.selected.length < event.extracted ? `, checking ${event.selected.length}` : '';
    write(`Extracted ${event.extracted} claim(s)${checking}`);
  };

  const onState = (event: ClaimStateEvent) => {
    write(c.dim(`  ${event.claimId} ${event.state}`));
  };

  const onResolved = (event: ClaimResolvedEvent) => {
    const { verdict, claim } = event;
    const color = statusColor(verdict.status);
    write(
      `  ${color(STATUS_ICON[verdict.status])} ${c.bold(claim.id)} ${color(verdict.status)}` +
      c.dim(` ${verdict.confidence.toFixed(2)}`) +
      `  ${truncate(claim.text, 80)}`,
    );
    if (verbose) {
      write(c.dim(`      ${verdict.explanation}`));
    }
  };

  const onComplete = (event: CheckCompleteEvent) => {
    const { report, counts } = event;
    write(
      `Reliability: ${reliabilityColor(report.overallReliability).bold(report.overallReliability.toUpperCase())}` +
      c.dim(`  verified ${counts.verified}, false ${counts.false}, unverifiable ${counts.unverifiable}`) +
      c.dim(`  (${(event.durationMs / 1000).toFixed(1)}s)`),
    );
  };

  const onSkipped = (event: ProviderSkippedEvent) => {
    write(c.dim(`    ${event.providerId} skipped: ${event.reason.replace('_', ' ')}`));
  };
  const onFailed = (event: ProviderFailedEvent) => {
    write(c.yellow(`    ${event.providerId} failed: ${event.error.message}`));
  };
  const onDisabled = (event: ProviderFailedEvent) => {
    write(c.red(`    ${event.providerId} disabled for this run: ${event.error.message}`));
  };

  engine.on('check:start', onStart);
  engine.on('check:cached', onCached);
  engine.on('claims:extracted', onExtracted);
  engine.on('claim:resolved', onResolved);
  engine.on('check:complete', onComplete);
  if (verbose) {
    engine.on('claim:state', onState);
    engine.router.on('provider:skipped', onSkipped);
    engine.router.on('provider:failed', onFailed);
    engine.router.on('provider:disabled', onDisabled);
  }

  return () => {
    engine.off('check:start', onStart);
    engine.off('check:cached', onCached);
    engine.off('claims:extracted', onExtracted);
    engine.off('claim:resolved', onResolved);
    engine.off('check:complete', onComplete);
    engine.off('claim:state', onState);
    engine.router.off('provider:skipped', onSkipped);
    engine.router.off('provider:failed', onFailed);
    engine.router.off('provider:disabled', onDisabled);
  };
}
