import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger, LogLevel } from '../src/utils/logger';

describe('Logger', () => {
    let logger: Logger;

    beforeEach(() => {
        logger = Logger.getInstance();
        logger.setConfig({ level: LogLevel.DEBUG, enableConsole: true });
        logger.clearLogs();
    });

    afterEach(() => {
        logger.setConfig({ level: LogLevel.INFO, enableFile: false, filePath: undefined, maxBufferSize: undefined });
        logger.clearLogs();
    });

    it('should be a singleton', () => {
        expect(Logger.getInstance()).toBe(logger);
    });

    describe('levels', () => {
        it('should record every level at debug', () => {
            logger.debug('d');
            logger.info('i');
            logger.warn('w');
            logger.error('e');
            expect(logger.getLogs().map(entry => entry.level)).toEqual([
                LogLevel.DEBUG,
                LogLevel.INFO,
                LogLevel.WARN,
                LogLevel.ERROR
            ]);
        });

        it('should drop messages below the configured level', () => {
            logger.setConfig({ level: LogLevel.WARN });
            logger.debug('d');
            logger.info('i');
            logger.warn('w');
            expect(logger.getLogs().map(entry => entry.message)).toEqual(['w']);
        });

        it('should parse level names', () => {
            expect(Logger.parseLevel('debug')).toBe(LogLevel.DEBUG);
            expect(Logger.parseLevel('WARN')).toBe(LogLevel.WARN);
            expect(Logger.parseLevel('error')).toBe(LogLevel.ERROR);
            expect(Logger.parseLevel('verbose')).toBe(LogLevel.INFO);
        });
    });

    describe('entries', () => {
        it('should keep structured data', () => {
            logger.info('Note inserted', { treeNumber: 0, position: 3 });
            const [entry] = logger.getLogs();
            expect(entry.message).toBe('Note inserted');
            expect(entry.data).toEqual({ treeNumber: 0, position: 3 });
            expect(new Date(entry.timestamp).toISOString()).toBe(entry.timestamp);
        });

        it('should write formatted lines to the console', () => {
            logger.warn('Root retired');
            expect(console.warn).toHaveBeenLastCalledWith(
                expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN: Root retired$/)
            );
        });

        it('should serialize bigint data', () => {
            logger.error('Transfer failed', { amount: 10n });
            expect(console.error).toHaveBeenLastCalledWith(expect.stringContaining('"amount": "10"'));
        });

        it('should stay silent on the console when disabled', () => {
            logger.setConfig({ enableConsole: false });
            const before = jest.mocked(console.info).mock.calls.length;
            logger.info('quiet');
            expect(jest.mocked(console.info).mock.calls.length).toBe(before);
            expect(logger.getLogs()).toHaveLength(1);
        });

        it('should bound the buffer', () => {
            logger.setConfig({ maxBufferSize: 2 });
            logger.info('one');
            logger.info('two');
            logger.info('three');
            expect(logger.getLogs().map(entry => entry.message)).toEqual(['two', 'three']);
        });

        it('should return a copy of the buffer', () => {
            logger.info('kept');
            logger.getLogs().pop();
            expect(logger.getLogs()).toHaveLength(1);
        });
    });

    describe('file output', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pool-log-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should append formatted entries', () => {
            const filePath = path.join(dir, 'pool.log');
            logger.setConfig({ enableFile: true, filePath, enableConsole: false });
            logger.info('first');
            logger.info('second');
            const lines = fs.readFileSync(filePath, 'utf8').trim().split('\n');
            expect(lines).toHaveLength(2);
            expect(lines[0]).toMatch(/\] INFO: first$/);
            expect(lines[1]).toMatch(/\] INFO: second$/);
        });
    });
});
