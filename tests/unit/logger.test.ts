// tests/unit/logger.test.ts

import { LogLevel, Logger } from '../../src/core/logging/Logger';

describe('Logger', () => {
    const initialLevel = Logger.getLevel();
    let spy: jest.SpyInstance;

    beforeEach(() => {
        spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        Logger.setLevel(LogLevel.INFO);
    });

    afterEach(() => {
        spy.mockRestore();
        Logger.setLevel(initialLevel);
    });

    function lastLine(): string {
        const call = spy.mock.calls[spy.mock.calls.length - 1];
        return String(call[0]);
    }

    it('should redact API keys in messages and context', () => {
        Logger.info('test', 'Using key sk-test-secret-placeholder-value', { key: 'sk-test-secret-placeholder-value' });
        expect(lastLine()).toMatch(/\[INFO\] \[test\] Using key \[REDACTED\] \{"key":"\[REDACTED\]"\}$/);
    });

    it('should drop messages below the current level', () => {
        Logger.debug('test', 'hidden');
        expect(spy).not.toHaveBeenCalled();

        Logger.setLevel(LogLevel.DEBUG);
        Logger.debug('test', 'shown');
        expect(lastLine()).toMatch(/\[DEBUG\] \[test\] shown$/);
    });

    it('should prefix scoped loggers with their namespace', () => {
        Logger.scope('modules').child('greeter').warn('careful');
        expect(lastLine()).toMatch(/\[WARN\] \[modules\.greeter\] careful$/);
    });
});
