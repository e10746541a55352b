import { Report } from '../types';

/**
 * Interface for backup orchestration
 */
export interface IBackupOrchestrator {
  executeBackup(): Promise<Report>;
}

/**
 * Interface for restore orchestration
 */
export interface IRestoreOrchestrator {
  executeRestore(): Promise<Report>;
}
