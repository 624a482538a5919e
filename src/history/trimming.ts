import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import type { Message } from "./models";

export interface TrimOptions {
    /** Maximum number of messages after the leading system message. */
    limit?: number;
    /** Maximum summed token estimate of the messages after the leading system message. */
    tokenBudget?: number;
    /** Tokenizer used for `tokenBudget`; `o200k_base` when unset. */
    encoding?: TiktokenEncoding;
}

/** Per-message framing tokens OpenAI adds around role and content. */
const MESSAGE_OVERHEAD_TOKENS = 4;

const FALLBACK_ENCODING: TiktokenEncoding = "o200k_base";

const encoders = new Map<TiktokenEncoding, Tiktoken>();

/** Older GPT-4 and GPT-3.5 models use `cl100k_base`; newer ones and unknown names get the fallback. */
export function encodingForModel(model: string): TiktokenEncoding {
    return /^(gpt-4(?!o|\.1)|gpt-3\.5|text-embedding)/.test(model) ? "cl100k_base" : FALLBACK_ENCODING;
}

function encoder(encoding: TiktokenEncoding): Tiktoken {
    let enc = encoders.get(encoding);
    if (!enc) {
        enc = getEncoding(encoding);
        encoders.set(encoding, enc);
    }
    return enc;
}

export function countMessageTokens(message: Message, encoding: TiktokenEncoding = FALLBACK_ENCODING): number {
    const enc = encoder(encoding);
    let total = MESSAGE_OVERHEAD_TOKENS + enc.encode(message.role).length;
    if (message.content) total += enc.encode(message.content).length;
    if (message.name) total += enc.encode(message.name).length;
    for (const call of message.toolCalls ?? []) {
        total += enc.encode(call.name).length + enc.encode(call.arguments).length;
    }
    return total;
}

/**
 * Splits messages into trimming units: an assistant message that requests tools
 * forms one unit with every message up to the last tool result answering it.
 * Every other message is a unit of its own.
 */
export function groupMessages(messages: readonly Message[]): Message[][] {
    const groups: Message[][] = [];
    let start = 0;
    while (start < messages.length) {
        let end = start;
        for (let k = start; k <= end; k++) {
            end = Math.max(end, lastAnswerIndex(messages, k));
        }
        groups.push(messages.slice(start, end + 1));
        start = end + 1;
    }
    return groups;
}

function lastAnswerIndex(messages: readonly Message[], index: number): number {
    const message = messages[index];
    if (!message || message.role !== "assistant" || !message.toolCalls?.length) return index;
    const ids = new Set(message.toolCalls.map((call) => call.id));
    let last = index;
    for (let i = index + 1; i < messages.length; i++) {
        const candidate = messages[i];
        if (candidate?.role === "tool" && candidate.toolCallId !== undefined && ids.has(candidate.toolCallId)) {
            last = i;
        }
    }
    return last;
}

/**
 * Keeps the most recent whole groups that fit the limits, always preserving a
 * leading system message. The result is the leading system message (if any)
 * followed by a contiguous suffix of the remaining messages.
 */
export function trimMessages(messages: readonly Message[], options: TrimOptions): Message[] {
    const { limit, tokenBudget, encoding = FALLBACK_ENCODING } = options;
    if (limit === undefined && tokenBudget === undefined) return [...messages];

    const head = messages[0]?.role === "system" ? messages.slice(0, 1) : [];
    const groups = groupMessages(messages.slice(head.length));

    const kept: Message[][] = [];
    let count = 0;
    let tokens = 0;
    for (let i = groups.length - 1; i >= 0; i--) {
        const group = groups[i] ?? [];
        const nextCount = count + group.length;
        if (limit !== undefined && nextCount > limit) break;
        if (tokenBudget !== undefined) {
            const groupTokens = group.reduce((sum, message) => sum + countMessageTokens(message, encoding), 0);
            if (tokens + groupTokens > tokenBudget) break;
            tokens += groupTokens;
        }
        count = nextCount;
        kept.unshift(group);
    }

    return [...head, ...kept.flat()];
}
