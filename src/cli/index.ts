#!/usr/bin/env node

import { Command } from 'commander';
import { ResourceCatalog } from '../catalog/ResourceCatalog';
import { OktaClient } from '../clients/OktaClient';
import { ConfigLoadOptions, ConfigLoader } from '../config/ConfigLoader';
import { AssociationHandlerRegistry } from '../handlers/AssociationHandlerRegistry';
import { BackupStore } from '../managers/BackupStore';
import { IdMappingStore } from '../managers/IdMappingStore';
import { BackupOrchestrator } from '../orchestrators/BackupOrchestrator';
import { RestoreOrchestrator } from '../orchestrators/RestoreOrchestrator';
import { Reporter } from '../reporters/Reporter';
import { EnvSyncConfig, Report } from '../types';

export interface CatalogCommandOptions {
  catalog?: string;
  export?: string;
}

/**
 * CLI interface for envsync
 */
class EnvSyncCLI {
  private program: Command;
  private configLoader: ConfigLoader;

  constructor(configLoader: ConfigLoader = new ConfigLoader()) {
    this.program = new Command();
    this.configLoader = configLoader;
    this.setupCommands();
  }

  /**
   * Setup CLI commands and options
   */
  private setupCommands(): void {
    this.program
      .name('envsync')
      .description('Back up an Okta org to local JSON files and restore it into another org')
      .version('1.0.0');

    this.withConnectionOptions(
      this.program
        .command('backup')
        .description('Back up every catalogued resource of the org')
        .option('-o, --output <dir>', 'Backup directory (default: ~/.okta/<org name>)')
    ).action(async (options: ConfigLoadOptions) => {
      try {
        await this.executeBackup(options);
      } catch (error) {
        console.error('❌ Backup failed:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

    this.withConnectionOptions(
      this.program
        .command('restore')
        .description('Restore a backup into the org, translating identifiers')
        .requiredOption('-i, --input <dir>', 'Backup directory to restore from')
        .option('--mapping <path>', 'ID mapping file (default: <input>/id_mapping.json)')
        .option('--resume', 'Skip records already recorded in the ID mapping')
    ).action(async (options: ConfigLoadOptions) => {
      try {
        await this.executeRestore(options);
      } catch (error) {
        console.error('❌ Restore failed:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

    this.program
      .command('catalog')
      .description('Validate and print the resource catalog')
      .option('--catalog <path>', 'Resource catalog JSON file')
      .option('--export <path>', 'Write the catalog as JSON to this path')
      .action(async (options: CatalogCommandOptions) => {
        try {
          await this.showCatalog(options);
        } catch (error) {
          console.error('❌ Catalog failed:', error instanceof Error ? error.message : String(error));
          process.exit(1);
        }
      });

    this.withConnectionOptions(
      this.program
        .command('validate-config')
        .description('Validate configuration and the resource catalog')
    ).action(async (options: ConfigLoadOptions) => {
      try {
        await this.validateConfig(options);
      } catch (error) {
        console.error('❌ Config validation failed:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
  }

  private withConnectionOptions(command: Command): Command {
    return command
      .option('-c, --config <path>', 'Path to envsync configuration file')
      .option('--okta-config <path>', 'Path to okta.yaml (default: ~/.okta/okta.yaml)')
      .option('--org-url <url>', 'Okta org URL')
      .option('--token <token>', 'Okta API token')
      .option('--allow-any-org', 'Allow orgs that are not developer orgs')
      .option('--catalog <path>', 'Resource catalog JSON file')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--log-path <path>', 'Custom log directory path');
  }

  /**
   * Execute backup operation
   */
  private async executeBackup(options: ConfigLoadOptions): Promise<void> {
    console.log('🚀 Starting envsync backup...\n');

    const config = await this.configLoader.load(options);
    const catalog = await this.loadCatalog(config.catalogPath);
    const reporter = new Reporter(config.reporting.logPath, config.reporting.verbose);

    const orchestrator = new BackupOrchestrator(
      this.createClient(config),
      new BackupStore(config.backup.outputDir),
      reporter,
      catalog
    );

    const report = await orchestrator.executeBackup();
    await this.finishReport(reporter, report);
  }

  /**
   * Execute restore operation
   */
  private async executeRestore(options: ConfigLoadOptions): Promise<void> {
    console.log('🚀 Starting envsync restore...\n');

    const config = await this.configLoader.load(options);
    const catalog = await this.loadCatalog(config.catalogPath);
    const reporter = new Reporter(config.reporting.logPath, config.reporting.verbose);

    const mapping = config.restore.mappingPath
      ? new IdMappingStore(config.restore.mappingPath)
      : IdMappingStore.forRestoreDirectory(config.restore.inputDir);
    await mapping.load();
    console.log(`🔗 Loaded ${mapping.count()} ID mappings from ${mapping.getFilePath()}`);

    const orchestrator = new RestoreOrchestrator(
      this.createClient(config),
      new BackupStore(config.restore.inputDir),
      mapping,
      reporter,
      catalog,
      AssociationHandlerRegistry.withDefaults(),
      { resume: config.restore.resume }
    );

    const report = await orchestrator.executeRestore();
    await this.finishReport(reporter, report);
  }

  /**
   * Print the catalog, optionally exporting it
   */
  private async showCatalog(options: CatalogCommandOptions): Promise<void> {
    const catalog = await this.loadCatalog(options.catalog);

    const sections = [
      { title: 'Singleton', descriptors: catalog.singletonResources() },
      { title: 'First pass', descriptors: catalog.independentResources() },
      { title: 'Second pass', descriptors: catalog.dependentResources() }
    ];

    for (const section of sections) {
      console.log(`📋 ${section.title} (${section.descriptors.length})`);
      for (const descriptor of section.descriptors) {
        const source = descriptor.sourceType ? ` <- ${descriptor.sourceType}.${descriptor.parameter ?? 'id'}` : '';
        console.log(`   • ${descriptor.name} ${descriptor.command}${source}`);
      }
      console.log('');
    }

    if (options.export) {
      await catalog.saveToFile(options.export);
      console.log(`💾 Catalog exported to ${options.export}`);
    }

    console.log(`✅ ${catalog.size()} resource descriptors are valid`);
  }

  /**
   * Validate configuration and catalog
   */
  private async validateConfig(options: ConfigLoadOptions): Promise<void> {
    console.log('✅ Validating configuration...\n');

    try {
      const config = await this.configLoader.load(options);
      const catalog = await this.loadCatalog(config.catalogPath);

      console.log(`🔗 Org: ${config.okta.orgUrl} (${config.okta.orgName})`);
      console.log(`📁 Backup directory: ${config.backup.outputDir}`);
      console.log(`📋 Catalog: ${catalog.size()} resource descriptors`);

      console.log('\n🎉 Configuration is valid!');
    } catch (error) {
      throw new Error(`Configuration validation failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async loadCatalog(catalogPath?: string): Promise<ResourceCatalog> {
    const catalog = catalogPath ? await ResourceCatalog.fromFile(catalogPath) : await ResourceCatalog.loadDefault();
    catalog.validate();
    return catalog;
  }

  private createClient(config: EnvSyncConfig): OktaClient {
    return new OktaClient(config.okta, config.client);
  }

  private async finishReport(reporter: Reporter, report: Report): Promise<void> {
    this.displayReport(report);
    const summaryPath = await reporter.saveSummary(report);
    await reporter.saveReport(report);
    console.log(`\n📝 Summary saved to ${summaryPath}`);
  }

  /**
   * Display run report
   */
  private displayReport(report: Report): void {
    const title = report.mode === 'backup' ? '💾 BACKUP REPORT' : '♻️ RESTORE REPORT';

    console.log(`\n${title}`);
    console.log('='.repeat(50));

    console.log(`📁 Target: ${report.target}`);
    console.log(`📊 Records Processed: ${report.summary.recordsProcessed}`);
    console.log(`✅ Records ${report.mode === 'backup' ? 'Saved' : 'Restored'}: ${report.summary.recordsSucceeded}`);
    if (report.mode === 'restore') {
      console.log(`🔗 ID Mappings Added: ${report.summary.mappingsAdded}`);
    }
    console.log(`⏱️ Execution Time: ${report.summary.executionTime}ms`);

    if (report.summary.recordsSkipped > 0) {
      console.log(`⏭️ Records Skipped: ${report.summary.recordsSkipped}`);
    }

    if (report.summary.recordsFailed > 0) {
      console.log(`❌ Records Failed: ${report.summary.recordsFailed}`);
    }

    if (report.details.issues.length > 0) {
      console.log(`⚠️ Issues: ${report.details.issues.length}`);
      report.details.issues.slice(0, 10).forEach(issue => {
        console.log(`   • ${issue.message}`);
      });
      if (report.details.issues.length > 10) {
        console.log(`   … ${report.details.issues.length - 10} more in the report file`);
      }
    }

    console.log('\n' + '='.repeat(50));
    console.log(`✅ ${report.mode === 'backup' ? 'Backup' : 'Restore'} completed!`);
  }

  /**
   * Run the CLI
   */
  public async run(argv: string[] = process.argv): Promise<void> {
    await this.program.parseAsync(argv);
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new EnvSyncCLI();
  cli.run().catch(error => {
    console.error('❌ CLI Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}

export { EnvSyncCLI };
