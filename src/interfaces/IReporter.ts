import { OperationMode, Phase, PhaseResult, Report, SyncIssue } from '../types';
import winston from 'winston';

/**
 * Interface for reporting and logging operations
 */
export interface IReporter {
  /**
   * Generate a run report
   */
  generateReport(
    mode: OperationMode,
    target: string,
    phases: PhaseResult[],
    issues: SyncIssue[],
    mappingsAdded: number,
    executionTime: number
  ): Report;

  /**
   * Generate summary text
   */
  generateSummary(report: Report): string;

  /**
   * Save report to file
   */
  saveReport(report: Report, filename?: string): Promise<string>;

  /**
   * Save summary to file
   */
  saveSummary(report: Report, filename?: string): Promise<string>;

  logOperationStart(mode: OperationMode, target: string): void;

  logOperationComplete(report: Report): void;

  logPhaseStart(mode: OperationMode, phase: Phase, resourceTypes: number): void;

  /**
   * Log a progress message
   */
  logProgress(message: string, meta?: Record<string, unknown>): void;

  logRecordSaved(resourceType: string, command: string, id: string, filePath: string): void;

  logRecordRestored(resourceType: string, oldId: string, newId?: string): void;

  logAssociation(description: string, degraded: boolean): void;

  /**
   * Log a recoverable or fatal issue
   */
  logIssue(issue: SyncIssue): void;

  /**
   * Get logger instance for external use
   */
  getLogger(): winston.Logger;
}
