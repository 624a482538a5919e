import { randomUUID } from "node:crypto";
import { ConversationNotFoundError, InvalidMessageError, StorageError, isToolkitError } from "../errors";
import { getLogger } from "../logger";
import {
    MESSAGE_ROLES,
    type Conversation,
    type ConversationSummary,
    type Message,
    type MessageInput,
    type MessageRole,
    type ToolCall,
} from "./models";
import type { StorageBackend } from "./storage/storage";
import { trimMessages, type TrimOptions } from "./trimming";

const logger = getLogger("history.manager");

export interface CreateConversationOptions {
    metadata?: Record<string, string>;
    /** Written as the leading system message in the same save. */
    systemPrompt?: string;
}

export interface AddMessageOptions {
    toolCalls?: ToolCall[];
    toolCallId?: string;
    /** Tool name, on tool messages. */
    name?: string;
}

export interface HistoryManagerOptions {
    now?: () => Date;
    generateId?: () => string;
}

/**
 * Owns conversations and their lifecycle. All persistence goes through the
 * configured backend; the manager keeps no conversation state of its own, so
 * operations on different conversations never share mutable data.
 */
export class HistoryManager {
    private readonly now: () => Date;
    private readonly generateId: () => string;

    constructor(private readonly storage: StorageBackend, options: HistoryManagerOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.generateId = options.generateId ?? randomUUID;
    }

    async createConversation(owner: string, options: CreateConversationOptions = {}): Promise<string> {
        const timestamp = this.timestamp();
        const conversation: Conversation = {
            id: this.generateId(),
            owner,
            messages: [],
            context: {},
            metadata: { ...options.metadata },
            createdAt: timestamp,
            updatedAt: timestamp,
        };
        if (options.systemPrompt !== undefined) {
            conversation.messages.push({ role: "system", content: options.systemPrompt, createdAt: timestamp });
        }

        await this.persist(conversation);
        logger.info({ conversationId: conversation.id, owner }, "conversation created");
        return conversation.id;
    }

    async getConversation(conversationId: string): Promise<Conversation> {
        const conversation = await this.fetch(conversationId);
        if (!conversation) throw new ConversationNotFoundError(conversationId);
        return conversation;
    }

    async hasConversation(conversationId: string): Promise<boolean> {
        return (await this.fetch(conversationId)) !== undefined;
    }

    async addMessage(
        conversationId: string,
        role: MessageRole,
        content: string | null,
        options: AddMessageOptions = {}
    ): Promise<Message> {
        const conversation = await this.getConversation(conversationId);
        const input: MessageInput = {
            role,
            content,
            ...(options.toolCalls?.length ? { toolCalls: options.toolCalls.map((call) => ({ ...call })) } : null),
            ...(options.toolCallId !== undefined ? { toolCallId: options.toolCallId } : null),
            ...(options.name !== undefined ? { name: options.name } : null),
        };
        validateMessage(conversation, input);

        const timestamp = this.timestamp();
        const message: Message = { ...input, createdAt: timestamp };
        // The loaded copy is discarded if the save fails, so a failed append leaves nothing behind.
        await this.persist({ ...conversation, messages: [...conversation.messages, message], updatedAt: timestamp });
        logger.debug({ conversationId, role }, "message added");
        return message;
    }

    /**
     * Ordered messages, optionally trimmed to the most recent whole groups.
     * A leading system message is always kept and does not count toward `limit`.
     */
    async getMessages(conversationId: string, options: TrimOptions | number = {}): Promise<Message[]> {
        const trim = typeof options === "number" ? { limit: options } : options;
        if (trim.limit !== undefined && (!Number.isInteger(trim.limit) || trim.limit < 0)) {
            throw new RangeError(`limit must be a non-negative integer, got ${trim.limit}`);
        }
        if (trim.tokenBudget !== undefined && !(trim.tokenBudget >= 0)) {
            throw new RangeError(`tokenBudget must be non-negative, got ${trim.tokenBudget}`);
        }
        const conversation = await this.getConversation(conversationId);
        return trimMessages(conversation.messages, trim);
    }

    /** Tool calls declared by assistant messages that no tool message has answered yet. */
    async getPendingToolCalls(conversationId: string): Promise<ToolCall[]> {
        const conversation = await this.getConversation(conversationId);
        const answered = new Set<string>();
        for (const message of conversation.messages) {
            if (message.role === "tool" && message.toolCallId !== undefined) answered.add(message.toolCallId);
        }
        return conversation.messages
            .flatMap((message) => message.toolCalls ?? [])
            .filter((call) => !answered.has(call.id))
            .map((call) => ({ ...call }));
    }

    async setContext(conversationId: string, key: string, value: string): Promise<void> {
        const conversation = await this.getConversation(conversationId);
        await this.persist({
            ...conversation,
            context: { ...conversation.context, [key]: value },
            updatedAt: this.timestamp(),
        });
    }

    async getContext(conversationId: string): Promise<Record<string, string>> {
        const conversation = await this.getConversation(conversationId);
        return { ...conversation.context };
    }

    /** Removes one key, or every key when `key` is omitted. */
    async clearContext(conversationId: string, key?: string): Promise<void> {
        const conversation = await this.getConversation(conversationId);
        const context = key === undefined ? {} : { ...conversation.context };
        if (key !== undefined) delete context[key];
        await this.persist({ ...conversation, context, updatedAt: this.timestamp() });
    }

    async listConversations(owner?: string): Promise<ConversationSummary[]> {
        return this.guard("list conversations", () => this.storage.list(owner));
    }

    /** Idempotent: deleting an unknown id is not an error. */
    async deleteConversation(conversationId: string): Promise<void> {
        await this.guard(`delete conversation ${conversationId}`, () => this.storage.delete(conversationId));
        logger.info({ conversationId }, "conversation deleted");
    }

    async close(): Promise<void> {
        await this.guard("close storage", () => this.storage.close());
    }

    private timestamp(): string {
        return this.now().toISOString();
    }

    private fetch(conversationId: string): Promise<Conversation | undefined> {
        return this.guard(`load conversation ${conversationId}`, () => this.storage.load(conversationId));
    }

    private persist(conversation: Conversation): Promise<void> {
        return this.guard(`save conversation ${conversation.id}`, () => this.storage.save(conversation));
    }

    /** Backends should already throw StorageError; anything else is wrapped. */
    private async guard<T>(action: string, op: () => Promise<T>): Promise<T> {
        try {
            return await op();
        } catch (error) {
            if (isToolkitError(error)) throw error;
            throw new StorageError(`Failed to ${action}`, error);
        }
    }
}

function validateMessage(conversation: Conversation, message: MessageInput): void {
    if (!(MESSAGE_ROLES as readonly string[]).includes(message.role)) {
        throw new InvalidMessageError(`Unknown message role '${String(message.role)}'`);
    }

    if (message.toolCalls && message.role !== "assistant") {
        throw new InvalidMessageError("Only assistant messages may carry tool calls");
    }
    if (message.role === "tool") {
        if (!message.toolCallId) throw new InvalidMessageError("Tool messages require a tool_call_id");
    } else if (message.toolCallId !== undefined) {
        throw new InvalidMessageError("Only tool messages may carry a tool_call_id");
    }
    if (message.name !== undefined && message.role !== "tool") {
        throw new InvalidMessageError("Only tool messages may carry a tool name");
    }
    if (message.content === null && !message.toolCalls?.length) {
        throw new InvalidMessageError("Message content may only be null on an assistant message with tool calls");
    }

    const declared = new Set<string>();
    const answered = new Set<string>();
    for (const existing of conversation.messages) {
        for (const call of existing.toolCalls ?? []) declared.add(call.id);
        if (existing.role === "tool" && existing.toolCallId !== undefined) answered.add(existing.toolCallId);
    }

    if (message.toolCalls) {
        const seen = new Set<string>();
        for (const call of message.toolCalls) {
            if (declared.has(call.id) || seen.has(call.id)) {
                throw new InvalidMessageError(`Duplicate tool call id '${call.id}'`);
            }
            seen.add(call.id);
        }
    }

    const unanswered = [...declared].filter((id) => !answered.has(id));
    if (message.role !== "tool" && unanswered.length > 0) {
        const ids = unanswered.map((id) => `'${id}'`).join(", ");
        throw new InvalidMessageError(`Tool call(s) ${ids} must be answered before another ${message.role} message`);
    }

    if (message.role === "tool" && message.toolCallId !== undefined) {
        if (!declared.has(message.toolCallId)) {
            throw new InvalidMessageError(`tool_call_id '${message.toolCallId}' does not match any assistant tool call`);
        }
        if (answered.has(message.toolCallId)) {
            throw new InvalidMessageError(`tool_call_id '${message.toolCallId}' has already been answered`);
        }
    }
}
