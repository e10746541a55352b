import { EnvSyncError, describeError } from '../errors';
import { IReporter } from '../interfaces';
import { OperationMode, Phase, PhaseResult, SyncIssue } from '../types';

export interface IssueContext {
  resourceType?: string;
  command?: string;
  identifier?: string;
}

/**
 * Per-run bookkeeping shared by the orchestrators: phase counters and the
 * issues reported along the way
 */
export class OperationJournal {
  private phases: PhaseResult[] = [];
  private issues: SyncIssue[] = [];
  private reporter: IReporter;
  private mode: OperationMode;

  constructor(reporter: IReporter, mode: OperationMode) {
    this.reporter = reporter;
    this.mode = mode;
  }

  beginPhase(phase: Phase, resourceTypes: number): void {
    this.phases.push({ phase, processed: 0, succeeded: 0, skipped: 0, failed: 0 });
    this.reporter.logPhaseStart(this.mode, phase, resourceTypes);
  }

  /**
   * Merge counters and already-logged issues produced outside the journal
   */
  absorb(result: PhaseResult, issues: SyncIssue[] = []): void {
    const current = this.current();
    this.issues.push(...issues);
    current.processed += result.processed;
    current.succeeded += result.succeeded;
    current.skipped += result.skipped;
    current.failed += result.failed;
  }

  recordSuccess(): void {
    const current = this.current();
    current.processed++;
    current.succeeded++;
  }

  /**
   * An item was not attempted
   */
  recordSkip(error: unknown, context: IssueContext = {}): void {
    const current = this.current();
    current.processed++;
    current.skipped++;
    this.warn(error, context);
  }

  /**
   * An item was attempted and the backend rejected it
   */
  recordFailure(error: unknown, context: IssueContext = {}): void {
    const current = this.current();
    current.processed++;
    current.failed++;
    this.warn(error, context);
  }

  /**
   * Report an issue without counting an item
   */
  warn(error: unknown, context: IssueContext = {}): void {
    const issue = this.createIssue(error, context);
    this.issues.push(issue);
    this.reporter.logIssue(issue);
  }

  getPhases(): PhaseResult[] {
    return this.phases.map(phase => ({ ...phase }));
  }

  getIssues(): SyncIssue[] {
    return [...this.issues];
  }

  private current(): PhaseResult {
    const current = this.phases[this.phases.length - 1];
    if (!current) {
      throw new Error('No phase has been started');
    }
    return current;
  }

  private createIssue(error: unknown, context: IssueContext): SyncIssue {
    const known = error instanceof EnvSyncError ? error : undefined;
    return {
      type: known ? known.type : 'unknown',
      message: describeError(error),
      timestamp: new Date(),
      recoverable: known ? known.recoverable : true,
      phase: this.phases[this.phases.length - 1]?.phase,
      ...context
    };
  }
}
