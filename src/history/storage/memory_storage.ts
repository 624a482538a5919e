import { compareByRecency, summarizeConversation, type Conversation, type ConversationSummary } from "../models";
import type { StorageBackend } from "./storage";

/**
 * Process-local backend. Stores deep copies so callers never share mutable
 * state with the store.
 */
export class MemoryStorage implements StorageBackend {
    private readonly conversations = new Map<string, Conversation>();

    async load(conversationId: string): Promise<Conversation | undefined> {
        const stored = this.conversations.get(conversationId);
        return stored ? structuredClone(stored) : undefined;
    }

    async save(conversation: Conversation): Promise<void> {
        this.conversations.set(conversation.id, structuredClone(conversation));
    }

    async delete(conversationId: string): Promise<void> {
        this.conversations.delete(conversationId);
    }

    async list(owner?: string): Promise<ConversationSummary[]> {
        const out: ConversationSummary[] = [];
        for (const conversation of this.conversations.values()) {
            if (owner !== undefined && conversation.owner !== owner) continue;
            out.push(summarizeConversation(conversation));
        }
        return out.sort(compareByRecency);
    }

    async close(): Promise<void> {
        this.conversations.clear();
    }
}
