// tests/unit/handler_registry.test.ts

import { HearthError } from '../../src/core/errors';
import { HandlerRegistry } from '../../src/core/extensions/HandlerRegistry';

describe('HandlerRegistry', () => {
    it('should refuse a name another extension already uses', () => {
        const registry = new HandlerRegistry();
        registry.register('modules.a', 'ping', () => 'a');

        expect(() => registry.register('modules.b', 'ping', () => 'b')).toThrow(HearthError);
        expect(() => registry.register('modules.b', 'ping', () => 'b')).toThrow(
            "Handler 'ping' is already registered by modules.a",
        );
    });

    it('should remove only the handlers of one owner', () => {
        const registry = new HandlerRegistry();
        registry.register('modules.a', 'ping', () => 'a');
        registry.register('modules.a', 'pong', () => 'a');
        registry.register('modules.b', 'echo', () => 'b');

        expect(registry.unregisterOwner('modules.a')).toBe(2);
        expect(registry.list().map(r => r.name)).toEqual(['echo']);
    });

    it('should pass arguments through invoke', async () => {
        const registry = new HandlerRegistry();
        registry.register('modules.a', 'add', (a, b) => Number(a) + Number(b));

        expect(await registry.invoke('add', 2, 3)).toBe(5);
        await expect(registry.invoke('missing')).rejects.toThrow("No handler named 'missing'");
    });
});
