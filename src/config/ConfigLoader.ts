import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as YAML from 'yaml';
import { ConfigurationError, describeError } from '../errors';
import { EnvSyncConfig } from '../types';
import { hasErrorCode, isRecord, stringField } from '../utils/records';

/**
 * Values collected from the command line; every field overrides the layers below it
 */
export interface ConfigLoadOptions {
  config?: string;
  oktaConfig?: string;
  orgUrl?: string;
  token?: string;
  allowAnyOrg?: boolean;
  catalog?: string;
  verbose?: boolean;
  logPath?: string;
  output?: string;
  input?: string;
  mapping?: string;
  resume?: boolean;
}

export interface ConfigEnvironment {
  env: NodeJS.ProcessEnv;
  homeDir: string;
}

const DEV_ORG_PATTERN = /(dev-\d+)\.okta\.com/i;

/**
 * Layered configuration: defaults, okta.yaml, envsync JSON file, environment, CLI flags
 */
export class ConfigLoader {
  private environment: ConfigEnvironment;

  constructor(environment: ConfigEnvironment = { env: process.env, homeDir: os.homedir() }) {
    this.environment = environment;
  }

  async load(options: ConfigLoadOptions = {}): Promise<EnvSyncConfig> {
    const config = this.createDefaultConfig();

    const oktaConfigPath = options.oktaConfig ?? path.join(this.environment.homeDir, '.okta', 'okta.yaml');
    const oktaConfigFound = await this.applyOktaYaml(config, oktaConfigPath);

    if (options.config) {
      await this.applyConfigFile(config, options.config);
    }

    this.applyEnvironment(config);
    this.applyCliOptions(config, options);

    if (!config.okta.orgUrl || !config.okta.token) {
      const hint = oktaConfigFound
        ? `${oktaConfigPath} does not define okta.client.orgUrl and okta.client.token`
        : `no Okta configuration found at ${oktaConfigPath}`;
      throw new ConfigurationError(
        `Okta org URL and API token are required: ${hint}; set OKTA_CLIENT_ORGURL and OKTA_CLIENT_TOKEN or pass --org-url and --token`
      );
    }

    this.finalize(config);
    return config;
  }

  /**
   * Create default configuration
   */
  createDefaultConfig(): EnvSyncConfig {
    return {
      okta: {
        orgUrl: '',
        token: '',
        orgName: '',
        allowAnyOrg: false
      },
      client: {
        timeout: 30000,
        maxRetries: 3,
        retryDelay: 1000
      },
      backup: {
        outputDir: ''
      },
      restore: {
        inputDir: '',
        resume: false
      },
      reporting: {
        verbose: false,
        logPath: './logs'
      }
    };
  }

  /**
   * Extract the `dev-NNN` org name from an org URL, undefined for other orgs
   */
  static devOrgName(orgUrl: string): string | undefined {
    return DEV_ORG_PATTERN.exec(orgUrl)?.[1];
  }

  /**
   * Read `okta.client.orgUrl` and `okta.client.token` from the Okta SDK file
   */
  private async applyOktaYaml(config: EnvSyncConfig, filePath: string): Promise<boolean> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw new ConfigurationError(`Failed to read Okta configuration ${filePath}: ${describeError(error)}`, error);
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse Okta configuration ${filePath}: ${describeError(error)}`, error);
    }

    const okta = isRecord(parsed) ? parsed.okta : undefined;
    const client = isRecord(okta) ? okta.client : undefined;
    if (isRecord(client)) {
      config.okta.orgUrl = stringField(client, 'orgUrl') ?? config.okta.orgUrl;
      config.okta.token = stringField(client, 'token') ?? config.okta.token;
    }
    config.okta.configFilePath = filePath;
    return true;
  }

  /**
   * Merge an envsync JSON configuration file
   */
  private async applyConfigFile(config: EnvSyncConfig, filePath: string): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to load configuration file ${filePath}: ${describeError(error)}`, error);
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Configuration file ${filePath} must contain a JSON object`);
    }

    const okta = this.section(parsed, 'okta');
    config.okta.orgUrl = this.stringSetting(okta, 'okta.orgUrl') ?? config.okta.orgUrl;
    config.okta.token = this.stringSetting(okta, 'okta.token') ?? config.okta.token;
    config.okta.allowAnyOrg = this.booleanSetting(okta, 'okta.allowAnyOrg') ?? config.okta.allowAnyOrg;

    config.catalogPath = this.stringSetting(parsed, 'catalogPath') ?? config.catalogPath;

    const client = this.section(parsed, 'client');
    config.client.timeout = this.numberSetting(client, 'client.timeout') ?? config.client.timeout;
    config.client.maxRetries = this.numberSetting(client, 'client.maxRetries') ?? config.client.maxRetries;
    config.client.retryDelay = this.numberSetting(client, 'client.retryDelay') ?? config.client.retryDelay;

    const backup = this.section(parsed, 'backup');
    config.backup.outputDir = this.stringSetting(backup, 'backup.outputDir') ?? config.backup.outputDir;

    const restore = this.section(parsed, 'restore');
    config.restore.inputDir = this.stringSetting(restore, 'restore.inputDir') ?? config.restore.inputDir;
    config.restore.mappingPath = this.stringSetting(restore, 'restore.mappingPath') ?? config.restore.mappingPath;
    config.restore.resume = this.booleanSetting(restore, 'restore.resume') ?? config.restore.resume;

    const reporting = this.section(parsed, 'reporting');
    config.reporting.verbose = this.booleanSetting(reporting, 'reporting.verbose') ?? config.reporting.verbose;
    config.reporting.logPath = this.stringSetting(reporting, 'reporting.logPath') ?? config.reporting.logPath;
  }

  private applyEnvironment(config: EnvSyncConfig): void {
    const { env } = this.environment;
    if (env.OKTA_CLIENT_ORGURL) {
      config.okta.orgUrl = env.OKTA_CLIENT_ORGURL;
    }
    if (env.OKTA_CLIENT_TOKEN) {
      config.okta.token = env.OKTA_CLIENT_TOKEN;
    }
  }

  /**
   * Apply CLI options to configuration
   */
  private applyCliOptions(config: EnvSyncConfig, options: ConfigLoadOptions): void {
    if (options.orgUrl) {
      config.okta.orgUrl = options.orgUrl;
    }
    if (options.token) {
      config.okta.token = options.token;
    }
    if (options.allowAnyOrg) {
      config.okta.allowAnyOrg = true;
    }
    if (options.catalog) {
      config.catalogPath = options.catalog;
    }

    if (options.verbose) {
      config.reporting.verbose = true;
    }
    if (options.logPath) {
      config.reporting.logPath = options.logPath;
    }

    if (options.output) {
      config.backup.outputDir = options.output;
    }
    if (options.input) {
      config.restore.inputDir = options.input;
    }
    if (options.mapping) {
      config.restore.mappingPath = options.mapping;
    }
    if (options.resume) {
      config.restore.resume = true;
    }
  }

  /**
   * Validate the merged configuration and derive the org name and default output directory
   */
  private finalize(config: EnvSyncConfig): void {
    config.okta.orgUrl = config.okta.orgUrl.trim().replace(/\/+$/, '');

    let url: URL;
    try {
      url = new URL(config.okta.orgUrl);
    } catch (error) {
      throw new ConfigurationError(`Invalid Okta org URL: ${config.okta.orgUrl}`, error);
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new ConfigurationError(`Okta org URL must use https: ${config.okta.orgUrl}`);
    }

    const devOrgName = ConfigLoader.devOrgName(url.hostname);
    if (devOrgName === undefined && !config.okta.allowAnyOrg) {
      throw new ConfigurationError(
        `${config.okta.orgUrl} is not a developer org (dev-<number>.okta.com); pass --allow-any-org to use it anyway`
      );
    }
    config.okta.orgName = devOrgName ?? url.hostname.split('.')[0];

    if (!config.backup.outputDir) {
      config.backup.outputDir = path.join(this.environment.homeDir, '.okta', config.okta.orgName);
    }

    const { timeout, maxRetries, retryDelay } = config.client;
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new ConfigurationError('client.timeout must be a positive integer');
    }
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigurationError('client.maxRetries must be a non-negative integer');
    }
    if (!Number.isInteger(retryDelay) || retryDelay < 0) {
      throw new ConfigurationError('client.retryDelay must be a non-negative integer');
    }
  }

  private section(parent: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = parent[key];
    if (value === undefined) {
      return {};
    }
    if (!isRecord(value)) {
      throw new ConfigurationError(`Configuration section ${key} must be an object`);
    }
    return value;
  }

  private stringSetting(section: Record<string, unknown>, name: string): string | undefined {
    return this.setting(section, name, 'string', (value): value is string => typeof value === 'string');
  }

  private numberSetting(section: Record<string, unknown>, name: string): number | undefined {
    return this.setting(section, name, 'number', (value): value is number => typeof value === 'number');
  }

  private booleanSetting(section: Record<string, unknown>, name: string): boolean | undefined {
    return this.setting(section, name, 'boolean', (value): value is boolean => typeof value === 'boolean');
  }

  private setting<T>(
    section: Record<string, unknown>,
    name: string,
    expected: string,
    guard: (value: unknown) => value is T
  ): T | undefined {
    const value = section[name.slice(name.lastIndexOf('.') + 1)];
    if (value === undefined) {
      return undefined;
    }
    if (!guard(value)) {
      throw new ConfigurationError(`${name} must be a ${expected}`);
    }
    return value;
  }
}
