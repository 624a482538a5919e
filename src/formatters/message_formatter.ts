import type { Conversation, MessageInput } from "../history/models";

export const FORMATTER_PROVIDERS = ["openai", "anthropic"] as const;
export type FormatterProvider = (typeof FORMATTER_PROVIDERS)[number];

export type FormatterInput = readonly MessageInput[] | Pick<Conversation, "messages">;

/**
 * Pure transform between stored messages and one provider's wire shape.
 * `parseMessages(formatMessages(x))` yields the same roles, content and
 * tool-call linkage as `x`.
 */
export interface MessageFormatter<Wire> {
    readonly provider: FormatterProvider;
    formatMessages(input: FormatterInput): Wire;
    parseMessages(wire: Wire): MessageInput[];
}

export function messagesOf(input: FormatterInput): readonly MessageInput[] {
    return "messages" in input ? input.messages : input;
}

/** Flattens text-bearing content parts; non-text parts are dropped. */
export function textOf(
    content: string | ReadonlyArray<{ type: string; text?: string }> | null | undefined
): string | null {
    if (content === null || content === undefined) return null;
    if (typeof content === "string") return content;
    return content
        .map((part) => (part.type === "text" && typeof part.text === "string" ? part.text : ""))
        .join("");
}
