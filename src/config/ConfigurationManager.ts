import * as fs from 'fs';
import { utils } from 'ethers';
import { ShieldPoolError, ErrorType } from '../errors/ErrorHandler';
import { Logger } from '../utils/logger';

export type Environment = 'development' | 'staging' | 'production';
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface MerkleConfig {
  depth: number;
}

export interface FeeConfig {
  shieldFeeBP: number;
  unshieldFeeBP: number;
  nftFee: string;
  treasury: string;
}

export interface LedgerConfig {
  chainId: number;
  relayAddress: string;
}

export interface LoggingConfig {
  level: LogLevelName;
  enableConsole: boolean;
}

export interface PoolConfig {
  environment: Environment;
  version: string;
  merkle: MerkleConfig;
  fees: FeeConfig;
  ledger: LedgerConfig;
  logging: LoggingConfig;
}

export type PoolConfigUpdate = {
  environment?: Environment;
  version?: string;
  merkle?: Partial<MerkleConfig>;
  fees?: Partial<FeeConfig>;
  ledger?: Partial<LedgerConfig>;
  logging?: Partial<LoggingConfig>;
};

export const MAX_TREE_DEPTH = 32;
// Fees may never exceed half of the amount
export const MAX_FEE_BP = 5000;

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];
const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

export class ConfigurationManager {
  private static instance: ConfigurationManager;
  private config: PoolConfig;
  private readonly defaultConfig: PoolConfig;

  private constructor() {
    this.defaultConfig = this.createDefaultConfig();
    this.config = cloneConfig(this.defaultConfig);
  }

  public static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  public getConfig(): PoolConfig {
    return cloneConfig(this.config);
  }

  public updateConfig(updates: PoolConfigUpdate): void {
    const newConfig: PoolConfig = {
      environment: updates.environment ?? this.config.environment,
      version: updates.version ?? this.config.version,
      merkle: { ...this.config.merkle, ...updates.merkle },
      fees: { ...this.config.fees, ...updates.fees },
      ledger: { ...this.config.ledger, ...updates.ledger },
      logging: { ...this.config.logging, ...updates.logging }
    };
    this.validateConfig(newConfig);
    this.config = newConfig;
    this.applyLoggingConfig();
  }

  /**
   * Pushes the logging section into the shared Logger
   */
  public applyLoggingConfig(): void {
    Logger.getInstance().setConfig({
      level: Logger.parseLevel(this.config.logging.level),
      enableConsole: this.config.logging.enableConsole
    });
  }

  public getEnvironment(): Environment {
    return this.config.environment;
  }

  public isProduction(): boolean {
    return this.config.environment === 'production';
  }

  public getMerkleConfig(): MerkleConfig {
    return { ...this.config.merkle };
  }

  public getFeeConfig(): FeeConfig {
    return { ...this.config.fees };
  }

  public getLedgerConfig(): LedgerConfig {
    return { ...this.config.ledger };
  }

  public getLoggingConfig(): LoggingConfig {
    return { ...this.config.logging };
  }

  public loadFromEnvironment(env: NodeJS.ProcessEnv = process.env): void {
    const envConfig: PoolConfigUpdate = {};

    if (env.SHIELDPOOL_ENVIRONMENT) {
      envConfig.environment = parseEnvironment(env.SHIELDPOOL_ENVIRONMENT);
    }

    if (env.SHIELDPOOL_TREE_DEPTH) {
      envConfig.merkle = { depth: parseInt(env.SHIELDPOOL_TREE_DEPTH, 10) };
    }

    if (env.SHIELDPOOL_SHIELD_FEE_BP) {
      envConfig.fees = {
        ...envConfig.fees,
        shieldFeeBP: parseInt(env.SHIELDPOOL_SHIELD_FEE_BP, 10)
      };
    }

    if (env.SHIELDPOOL_UNSHIELD_FEE_BP) {
      envConfig.fees = {
        ...envConfig.fees,
        unshieldFeeBP: parseInt(env.SHIELDPOOL_UNSHIELD_FEE_BP, 10)
      };
    }

    if (env.SHIELDPOOL_TREASURY) {
      envConfig.fees = { ...envConfig.fees, treasury: env.SHIELDPOOL_TREASURY };
    }

    if (env.SHIELDPOOL_CHAIN_ID) {
      envConfig.ledger = { ...envConfig.ledger, chainId: parseInt(env.SHIELDPOOL_CHAIN_ID, 10) };
    }

    if (env.SHIELDPOOL_RELAY_ADDRESS) {
      envConfig.ledger = { ...envConfig.ledger, relayAddress: env.SHIELDPOOL_RELAY_ADDRESS };
    }

    if (env.SHIELDPOOL_LOG_LEVEL) {
      envConfig.logging = {
        ...envConfig.logging,
        level: parseLogLevel(env.SHIELDPOOL_LOG_LEVEL)
      };
    }

    this.updateConfig(envConfig);
  }

  public loadFromFile(filePath: string): void {
    let fileConfig: PoolConfigUpdate;
    try {
      const configData = fs.readFileSync(filePath, 'utf8');
      fileConfig = JSON.parse(configData);
    } catch (error) {
      throw new ShieldPoolError(
        `Failed to load configuration from file: ${filePath}`,
        ErrorType.CONFIGURATION_ERROR,
        { filePath, error: error instanceof Error ? error.message : 'Unknown error' }
      );
    }
    this.updateConfig(fileConfig);
  }

  public validateConfig(config: PoolConfig): void {
    const errors: string[] = [];

    if (!ENVIRONMENTS.includes(config.environment)) {
      errors.push('Invalid environment. Must be development, staging, or production.');
    }

    if (!Number.isInteger(config.merkle.depth) || config.merkle.depth < 1 || config.merkle.depth > MAX_TREE_DEPTH) {
      errors.push(`Merkle depth must be an integer between 1 and ${MAX_TREE_DEPTH}.`);
    }

    for (const [name, value] of [['shieldFeeBP', config.fees.shieldFeeBP], ['unshieldFeeBP', config.fees.unshieldFeeBP]] as const) {
      if (!Number.isInteger(value) || value < 0 || value > MAX_FEE_BP) {
        errors.push(`${name} must be an integer between 0 and ${MAX_FEE_BP}.`);
      }
    }

    try {
      if (BigInt(config.fees.nftFee) < 0n) {
        errors.push('NFT fee must be non-negative.');
      }
    } catch {
      errors.push('NFT fee must be a valid integer.');
    }

    if (!utils.isAddress(config.fees.treasury)) {
      errors.push('Treasury must be a valid address.');
    }

    if (!utils.isAddress(config.ledger.relayAddress)) {
      errors.push('Relay address must be a valid address.');
    }

    if (!Number.isInteger(config.ledger.chainId) || config.ledger.chainId <= 0) {
      errors.push('Chain id must be a positive integer.');
    }

    if (!LOG_LEVELS.includes(config.logging.level)) {
      errors.push('Log level must be one of debug, info, warn, error.');
    }

    if (errors.length > 0) {
      throw new ShieldPoolError(
        'Configuration validation failed',
        ErrorType.CONFIGURATION_ERROR,
        { errors }
      );
    }
  }

  public resetToDefaults(): void {
    this.config = cloneConfig(this.defaultConfig);
  }

  private createDefaultConfig(): PoolConfig {
    return {
      environment: 'development',
      version: '0.1.0',
      merkle: {
        depth: 16
      },
      fees: {
        shieldFeeBP: 25,
        unshieldFeeBP: 25,
        nftFee: '0',
        treasury: '0x000000000000000000000000000000000000dead'
      },
      ledger: {
        chainId: 1,
        relayAddress: '0x00000000000000000000000000000000000a11ce'
      },
      logging: {
        level: 'info',
        enableConsole: true
      }
    };
  }
}

function cloneConfig(config: PoolConfig): PoolConfig {
  return {
    environment: config.environment,
    version: config.version,
    merkle: { ...config.merkle },
    fees: { ...config.fees },
    ledger: { ...config.ledger },
    logging: { ...config.logging }
  };
}

function parseEnvironment(value: string): Environment {
  const match = ENVIRONMENTS.find(environment => environment === value);
  if (!match) {
    throw new ShieldPoolError(
      `Unknown environment: ${value}`,
      ErrorType.CONFIGURATION_ERROR,
      { environment: value }
    );
  }
  return match;
}

function parseLogLevel(value: string): LogLevelName {
  const match = LOG_LEVELS.find(level => level === value.toLowerCase());
  if (!match) {
    throw new ShieldPoolError(
      `Unknown log level: ${value}`,
      ErrorType.CONFIGURATION_ERROR,
      { level: value }
    );
  }
  return match;
}
