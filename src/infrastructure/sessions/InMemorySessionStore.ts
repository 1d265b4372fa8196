/**
 * In-Memory Session Store
 *
 * Process-local session registry keyed by user id.
 * Sessions idle for longer than the TTL are evicted, lazily on read
 * and in bulk by the periodic sweep.
 */

import { ConversationSession } from '../../domain/entities/ConversationSession';
import { ISessionStore } from '../../domain/ports/ISessionStore';

interface SessionEntry {
    session: ConversationSession;
    expiresAt: number | null; // null = no expiry
}

export class InMemorySessionStore implements ISessionStore {
    private sessions: Map<string, SessionEntry> = new Map();
    private sweepTimer: NodeJS.Timeout | null = null;

    /**
     * @param ttlSeconds Idle time before a session is evicted; 0 disables eviction
     */
    constructor(private readonly ttlSeconds: number = 3600) { }

    async get(userId: string): Promise<ConversationSession | null> {
        const entry = this.sessions.get(userId);

        if (!entry) {
            return null;
        }

        if (entry.expiresAt !== null && Date.now() > entry.expiresAt) {
            this.sessions.delete(userId);
            return null;
        }

        return entry.session;
    }

    async save(session: ConversationSession): Promise<void> {
        const expiresAt = this.ttlSeconds > 0 ? Date.now() + (this.ttlSeconds * 1000) : null;
        this.sessions.set(session.userId, { session, expiresAt });
    }

    size(): number {
        return this.sessions.size;
    }

    /**
     * Removes expired sessions.
     * @returns Number of sessions removed
     */
    cleanup(): number {
        const now = Date.now();
        let cleaned = 0;

        for (const [userId, entry] of this.sessions.entries()) {
            if (entry.expiresAt !== null && now > entry.expiresAt) {
                this.sessions.delete(userId);
                cleaned++;
            }
        }

        return cleaned;
    }

    /**
     * Runs cleanup every intervalMs. The timer does not keep the process alive.
     */
    startEviction(intervalMs: number): void {
        this.stopEviction();
        this.sweepTimer = setInterval(() => {
            const cleaned = this.cleanup();
            if (cleaned > 0) {
                console.log(`[Sessions] Evicted ${cleaned} idle session(s), ${this.sessions.size} remaining`);
            }
        }, intervalMs);
        this.sweepTimer.unref();
    }

    stopEviction(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }
}
