import { InMemorySessionStore } from '../../../src/infrastructure/sessions/InMemorySessionStore';
import { createConversationSession } from '../../../src/domain/entities/ConversationSession';

describe('InMemorySessionStore', () => {
    let now: number;

    beforeEach(() => {
        now = 1_700_000_000_000;
        jest.spyOn(Date, 'now').mockImplementation(() => now);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    const session = (userId: string) => createConversationSession(userId, `chat-${userId}`, 'cycle-1');

    test('should return null for unknown users', async () => {
        const store = new InMemorySessionStore(60);

        expect(await store.get('nobody')).toBeNull();
    });

    test('should save, read and replace sessions per user', async () => {
        const store = new InMemorySessionStore(60);
        const saved = session('u1');

        await store.save(saved);
        expect(await store.get('u1')).toBe(saved);
        expect(store.size()).toBe(1);

        const replacement = { ...saved, state: 'AwaitingPrompt' as const };
        await store.save(replacement);
        expect(await store.get('u1')).toBe(replacement);
        expect(store.size()).toBe(1);
    });

    test('should not expose a delete operation; sessions end by being replaced or expiring', () => {
        const store = new InMemorySessionStore(60);
        expect('delete' in store).toBe(false);
    });

    test('should expire sessions idle past the TTL on read', async () => {
        const store = new InMemorySessionStore(60);
        await store.save(session('u1'));

        now += 60_000;
        expect(await store.get('u1')).not.toBeNull();

        now += 1;
        expect(await store.get('u1')).toBeNull();
        expect(store.size()).toBe(0);
    });

    test('should restart the idle timer on every save', async () => {
        const store = new InMemorySessionStore(60);
        await store.save(session('u1'));

        now += 50_000;
        await store.save(session('u1'));
        now += 50_000;

        expect(await store.get('u1')).not.toBeNull();
    });

    test('should keep sessions forever when TTL is 0', async () => {
        const store = new InMemorySessionStore(0);
        await store.save(session('u1'));

        now += 365 * 24 * 3600 * 1000;

        expect(await store.get('u1')).not.toBeNull();
    });

    test('cleanup should remove only expired sessions', async () => {
        const store = new InMemorySessionStore(60);
        await store.save(session('old'));
        now += 30_000;
        await store.save(session('recent'));
        now += 31_000;

        expect(store.cleanup()).toBe(1);
        expect(store.size()).toBe(1);
        expect(await store.get('recent')).not.toBeNull();
    });

    test('eviction sweep should run on its interval', async () => {
        jest.useFakeTimers({ doNotFake: ['Date'] });
        jest.spyOn(console, 'log').mockImplementation(() => { });
        const store = new InMemorySessionStore(60);
        await store.save(session('u1'));

        store.startEviction(1000);
        now += 61_000;
        jest.advanceTimersByTime(1000);

        expect(store.size()).toBe(0);
        expect(console.log).toHaveBeenCalledWith('[Sessions] Evicted 1 idle session(s), 0 remaining');

        store.stopEviction();
        jest.useRealTimers();
    });
});
