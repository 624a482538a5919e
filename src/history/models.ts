import { z } from "zod";

export const MESSAGE_ROLES = ["system", "user", "assistant", "tool"] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

/** Ids double as file names and primary keys. */
export const CONVERSATION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export const toolCallSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    /** JSON text exactly as the model produced it. */
    arguments: z.string(),
});

export const messageSchema = z.object({
    role: z.enum(MESSAGE_ROLES),
    content: z.string().nullable(),
    toolCalls: z.array(toolCallSchema).optional(),
    toolCallId: z.string().optional(),
    name: z.string().optional(),
    createdAt: z.string(),
});

export const conversationSchema = z.object({
    id: z.string().min(1),
    owner: z.string(),
    messages: z.array(messageSchema),
    context: z.record(z.string()),
    metadata: z.record(z.string()),
    createdAt: z.string(),
    updatedAt: z.string(),
});

export type ToolCall = z.infer<typeof toolCallSchema>;
export type Message = z.infer<typeof messageSchema>;
export type Conversation = z.infer<typeof conversationSchema>;

/** Message fields supplied by callers; `createdAt` is stamped on append. */
export type MessageInput = Omit<Message, "createdAt">;

export interface ConversationSummary {
    id: string;
    owner: string;
    messageCount: number;
    createdAt: string;
    updatedAt: string;
}

export function summarizeConversation(conversation: Conversation): ConversationSummary {
    return {
        id: conversation.id,
        owner: conversation.owner,
        messageCount: conversation.messages.length,
        createdAt: conversation.createdAt,
        updatedAt: conversation.updatedAt,
    };
}

/** Newest activity first; ties broken by id for a stable order. */
export function compareByRecency(a: ConversationSummary, b: ConversationSummary): number {
    if (a.updatedAt !== b.updatedAt) return a.updatedAt < b.updatedAt ? 1 : -1;
    return a.id.localeCompare(b.id);
}

/** Decodes untrusted persisted data, returning the issues on failure. */
export function decodeConversation(
    value: unknown
): { ok: true; conversation: Conversation } | { ok: false; error: string } {
    const parsed = conversationSchema.safeParse(value);
    if (parsed.success) return { ok: true, conversation: parsed.data };
    return {
        ok: false,
        error: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    };
}
