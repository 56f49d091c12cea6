import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationManager } from '../src/config/ConfigurationManager';
import { ErrorType, ShieldPoolError } from '../src/errors/ErrorHandler';
import { Logger, LogLevel } from '../src/utils/logger';
import { captureError } from './helpers/errors';

describe('ConfigurationManager', () => {
    let configManager: ConfigurationManager;

    beforeEach(() => {
        configManager = ConfigurationManager.getInstance();
        configManager.resetToDefaults();
    });

    afterEach(() => {
        Logger.getInstance().setConfig({ level: LogLevel.INFO });
    });

    describe('defaults', () => {
        it('should load the default configuration', () => {
            const config = configManager.getConfig();
            expect(config.environment).toBe('development');
            expect(config.merkle.depth).toBe(16);
            expect(config.fees).toEqual({
                shieldFeeBP: 25,
                unshieldFeeBP: 25,
                nftFee: '0',
                treasury: '0x000000000000000000000000000000000000dead'
            });
            expect(config.ledger.chainId).toBe(1);
            expect(config.logging.level).toBe('info');
        });

        it('should be a singleton', () => {
            expect(ConfigurationManager.getInstance()).toBe(configManager);
        });

        it('should hand out copies', () => {
            const config = configManager.getConfig();
            config.merkle.depth = 3;
            expect(configManager.getMerkleConfig().depth).toBe(16);
        });
    });

    describe('updateConfig', () => {
        it('should merge partial sections', () => {
            configManager.updateConfig({ fees: { shieldFeeBP: 50 }, environment: 'staging' });
            expect(configManager.getFeeConfig().shieldFeeBP).toBe(50);
            expect(configManager.getFeeConfig().unshieldFeeBP).toBe(25);
            expect(configManager.getEnvironment()).toBe('staging');
            expect(configManager.isProduction()).toBe(false);
        });

        it('should reject invalid values and keep the previous configuration', () => {
            const error = captureError(() => configManager.updateConfig({ merkle: { depth: 0 }, fees: { shieldFeeBP: 6000 } }));
            expect(error.type).toBe(ErrorType.CONFIGURATION_ERROR);
            expect(error.message).toBe('Configuration validation failed');
            expect(error.context.errors).toEqual([
                'Merkle depth must be an integer between 1 and 32.',
                'shieldFeeBP must be an integer between 0 and 5000.'
            ]);
            expect(configManager.getMerkleConfig().depth).toBe(16);
        });

        it('should validate addresses and the NFT fee', () => {
            expect(captureError(() => configManager.updateConfig({ fees: { treasury: '0x1234' } })).context.errors).toEqual([
                'Treasury must be a valid address.'
            ]);
            expect(captureError(() => configManager.updateConfig({ fees: { nftFee: 'abc' } })).context.errors).toEqual([
                'NFT fee must be a valid integer.'
            ]);
            expect(captureError(() => configManager.updateConfig({ fees: { nftFee: '-1' } })).context.errors).toEqual([
                'NFT fee must be non-negative.'
            ]);
            expect(captureError(() => configManager.updateConfig({ ledger: { chainId: 0 } })).context.errors).toEqual([
                'Chain id must be a positive integer.'
            ]);
        });

        it('should push the logging level into the logger', () => {
            const logger = Logger.getInstance();
            logger.clearLogs();
            configManager.updateConfig({ logging: { level: 'debug' } });
            logger.debug('config check');
            expect(logger.getLogs().map(entry => entry.message)).toContain('config check');
        });

        it('should restore defaults', () => {
            configManager.updateConfig({ merkle: { depth: 8 } });
            configManager.resetToDefaults();
            expect(configManager.getMerkleConfig().depth).toBe(16);
        });
    });

    describe('loadFromFile', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pool-config-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should apply a JSON file', () => {
            const file = path.join(dir, 'pool.json');
            fs.writeFileSync(file, JSON.stringify({ merkle: { depth: 20 }, ledger: { chainId: 137 } }));
            configManager.loadFromFile(file);
            expect(configManager.getMerkleConfig().depth).toBe(20);
            expect(configManager.getLedgerConfig().chainId).toBe(137);
        });

        it('should report unreadable files as configuration errors', () => {
            const file = path.join(dir, 'missing.json');
            const error = captureError(() => configManager.loadFromFile(file));
            expect(error).toBeInstanceOf(ShieldPoolError);
            expect(error.type).toBe(ErrorType.CONFIGURATION_ERROR);
            expect(error.message).toBe(`Failed to load configuration from file: ${file}`);
        });

        it('should report malformed JSON', () => {
            const file = path.join(dir, 'broken.json');
            fs.writeFileSync(file, '{ depth: ');
            expect(captureError(() => configManager.loadFromFile(file)).context.filePath).toBe(file);
        });
    });
});
