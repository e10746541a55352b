import { IReporter } from '../interfaces';
import { OperationMode, Phase, PhaseResult, Report, SyncIssue } from '../types';
import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';

/**
 * Reporter for backup and restore runs: winston logging, reports and summaries
 */
export class Reporter implements IReporter {
  private logger!: winston.Logger;
  private logPath: string;
  private verbose: boolean;

  constructor(logPath: string = './logs', verbose: boolean = false) {
    this.logPath = logPath;
    this.verbose = verbose;
    this.setupLogger();
  }

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
  ): Report {
    const total = (field: 'processed' | 'succeeded' | 'skipped' | 'failed'): number =>
      phases.reduce((sum, phase) => sum + phase[field], 0);

    const report: Report = {
      timestamp: new Date(),
      mode,
      target,
      summary: {
        recordsProcessed: total('processed'),
        recordsSucceeded: total('succeeded'),
        recordsSkipped: total('skipped'),
        recordsFailed: total('failed'),
        mappingsAdded,
        executionTime
      },
      details: {
        phases,
        issues
      }
    };

    this.logger.info(`${mode} report generated`, {
      mode,
      target,
      summary: report.summary,
      issueCount: issues.length
    });

    return report;
  }

  /**
   * Generate summary text
   */
  generateSummary(report: Report): string {
    const { summary, details } = report;
    const lines: string[] = [];

    lines.push(`=== envsync ${report.mode.toUpperCase()} Report ===`);
    lines.push(`Timestamp: ${report.timestamp.toISOString()}`);
    lines.push(`Target: ${report.target}`);
    lines.push('');

    lines.push('SUMMARY:');
    lines.push(`  Records Processed: ${summary.recordsProcessed}`);
    lines.push(`  Records ${report.mode === 'backup' ? 'Saved' : 'Restored'}: ${summary.recordsSucceeded}`);
    lines.push(`  Records Skipped: ${summary.recordsSkipped}`);
    lines.push(`  Records Failed: ${summary.recordsFailed}`);
    if (report.mode === 'restore') {
      lines.push(`  ID Mappings Added: ${summary.mappingsAdded}`);
    }
    lines.push(`  Execution Time: ${(summary.executionTime / 1000).toFixed(2)}s`);
    lines.push('');

    if (details.phases.length > 0) {
      lines.push('PHASES:');
      details.phases.forEach(phase => {
        lines.push(
          `  ${phase.phase}: ${phase.succeeded} ok, ${phase.skipped} skipped, ${phase.failed} failed`
        );
      });
      lines.push('');
    }

    if (details.issues.length > 0) {
      lines.push('ISSUES:');
      details.issues.forEach(issue => {
        lines.push(`  ${issue.type}: ${issue.message}`);
      });
      lines.push('');
    }

    const attempted = summary.recordsSucceeded + summary.recordsFailed;
    const successRate = attempted > 0 ? (summary.recordsSucceeded / attempted * 100).toFixed(1) : '100.0';
    lines.push(`Success Rate: ${successRate}%`);

    return lines.join('\n');
  }

  /**
   * Save report to file
   */
  async saveReport(report: Report, filename?: string): Promise<string> {
    await this.ensureLogDirectory();

    if (!filename) {
      filename = `envsync-report-${report.mode}-${this.fileTimestamp(report)}.json`;
    }

    const filePath = path.join(this.logPath, filename);

    try {
      await fs.promises.writeFile(filePath, JSON.stringify(report, null, 2), 'utf8');
      this.logger.info(`Report saved to ${filePath}`);
      return filePath;
    } catch (error) {
      const errorMessage = `Failed to save report: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error(errorMessage);
      throw new Error(errorMessage);
    }
  }

  /**
   * Save summary to file
   */
  async saveSummary(report: Report, filename?: string): Promise<string> {
    await this.ensureLogDirectory();

    if (!filename) {
      filename = `envsync-summary-${report.mode}-${this.fileTimestamp(report)}.txt`;
    }

    const filePath = path.join(this.logPath, filename);

    try {
      await fs.promises.writeFile(filePath, this.generateSummary(report), 'utf8');
      this.logger.info(`Summary saved to ${filePath}`);
      return filePath;
    } catch (error) {
      const errorMessage = `Failed to save summary: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error(errorMessage);
      throw new Error(errorMessage);
    }
  }

  logOperationStart(mode: OperationMode, target: string): void {
    this.logger.info(`Starting ${mode}`, { mode, target });
  }

  logOperationComplete(report: Report): void {
    this.logger.info(`${report.mode} completed`, {
      mode: report.mode,
      target: report.target,
      recordsProcessed: report.summary.recordsProcessed,
      recordsSucceeded: report.summary.recordsSucceeded,
      recordsSkipped: report.summary.recordsSkipped,
      recordsFailed: report.summary.recordsFailed,
      mappingsAdded: report.summary.mappingsAdded,
      executionTime: report.summary.executionTime,
      issueCount: report.details.issues.length
    });
  }

  logPhaseStart(mode: OperationMode, phase: Phase, resourceTypes: number): void {
    this.logger.info(`${mode}: ${phase} pass`, { mode, phase, resourceTypes });
  }

  logProgress(message: string, meta: Record<string, unknown> = {}): void {
    this.logger.info(message, meta);
  }

  logRecordSaved(resourceType: string, command: string, id: string, filePath: string): void {
    this.logger.debug(`Saved ${resourceType} ${id}`, { resourceType, command, id, filePath });
  }

  logRecordRestored(resourceType: string, oldId: string, newId?: string): void {
    if (newId !== undefined) {
      this.logger.info(`Mapped ${resourceType} old ID ${oldId} to new ID ${newId}`, { resourceType, oldId, newId });
    } else {
      this.logger.info(`Restored ${resourceType} ${oldId}`, { resourceType, oldId });
    }
  }

  logAssociation(description: string, degraded: boolean): void {
    this.logger.info(description, { degraded });
  }

  logIssue(issue: SyncIssue): void {
    const meta = {
      type: issue.type,
      phase: issue.phase,
      resourceType: issue.resourceType,
      command: issue.command,
      identifier: issue.identifier
    };
    if (issue.recoverable) {
      this.logger.warn(issue.message, meta);
    } else {
      this.logger.error(issue.message, meta);
    }
  }

  /**
   * Get logger instance for external use
   */
  getLogger(): winston.Logger {
    return this.logger;
  }

  /**
   * Setup Winston logger with file and console transports
   */
  private setupLogger(): void {
    this.ensureLogDirectorySync();

    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );

    const consoleFormat = winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    );

    this.logger = winston.createLogger({
      level: this.verbose ? 'debug' : 'info',
      format: logFormat,
      transports: [
        new winston.transports.File({
          filename: path.join(this.logPath, 'envsync.log'),
          maxsize: 10 * 1024 * 1024, // 10MB
          maxFiles: 5,
          tailable: true
        }),
        new winston.transports.File({
          filename: path.join(this.logPath, 'envsync-error.log'),
          level: 'error',
          maxsize: 10 * 1024 * 1024, // 10MB
          maxFiles: 5,
          tailable: true
        }),
        new winston.transports.Console({
          format: consoleFormat,
          level: process.env.NODE_ENV === 'test' ? 'error' : this.verbose ? 'debug' : 'info'
        })
      ]
    });
  }

  private fileTimestamp(report: Report): string {
    return report.timestamp.toISOString().replace(/[:.]/g, '-');
  }

  private async ensureLogDirectory(): Promise<void> {
    try {
      await fs.promises.access(this.logPath);
    } catch {
      await fs.promises.mkdir(this.logPath, { recursive: true });
    }
  }

  private ensureLogDirectorySync(): void {
    try {
      fs.accessSync(this.logPath);
    } catch {
      fs.mkdirSync(this.logPath, { recursive: true });
    }
  }
}
