import { ConversationSession } from '../entities/ConversationSession';

/**
 * ISessionStore - Port for the per-user session registry.
 * Implementations: InMemorySessionStore
 */
export interface ISessionStore {
    /**
     * @returns The session or null if absent or expired
     */
    get(userId: string): Promise<ConversationSession | null>;

    /**
     * Inserts or replaces the session for its user id.
     */
    save(session: ConversationSession): Promise<void>;

    /**
     * Number of live sessions (for monitoring).
     */
    size(): number;
}
