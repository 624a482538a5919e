import type Anthropic from "@anthropic-ai/sdk";
import { InvalidMessageError } from "../errors";
import type { MessageInput, ToolCall } from "../history/models";
import { messagesOf, textOf, type FormatterInput, type MessageFormatter } from "./message_formatter";

export interface AnthropicWire {
    system?: string;
    messages: Anthropic.MessageParam[];
}

/**
 * Messages API wire shape. System messages move to the top-level `system`
 * field, tool calls become `tool_use` blocks and tool results become
 * `tool_result` blocks inside a user turn. Adjacent user-side messages share
 * one turn so roles keep alternating.
 */
export class AnthropicMessageFormatter implements MessageFormatter<AnthropicWire> {
    readonly provider = "anthropic" as const;

    formatMessages(input: FormatterInput): AnthropicWire {
        const system: string[] = [];
        const messages: Anthropic.MessageParam[] = [];

        for (const message of messagesOf(input)) {
            switch (message.role) {
                case "system":
                    system.push(message.content ?? "");
                    break;
                case "user":
                    appendUserBlock(messages, { type: "text", text: message.content ?? "" });
                    break;
                case "tool":
                    appendUserBlock(messages, {
                        type: "tool_result",
                        tool_use_id: message.toolCallId ?? "",
                        content: message.content ?? "",
                    });
                    break;
                case "assistant":
                    messages.push(assistantTurn(message));
                    break;
            }
        }

        return system.length ? { system: system.join("\n\n"), messages } : { messages };
    }

    parseMessages(wire: AnthropicWire): MessageInput[] {
        const out: MessageInput[] = [];
        if (wire.system !== undefined) out.push({ role: "system", content: wire.system });

        const toolNames = new Map<string, string>();
        for (const turn of wire.messages) {
            if (typeof turn.content === "string") {
                out.push({ role: turn.role, content: turn.content });
                continue;
            }

            if (turn.role === "assistant") {
                const calls: ToolCall[] = [];
                let text = "";
                for (const block of turn.content) {
                    if (block.type === "text") text += block.text;
                    else if (block.type === "tool_use") {
                        calls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
                        toolNames.set(block.id, block.name);
                    }
                }
                out.push(
                    calls.length
                        ? { role: "assistant", content: text.length ? text : null, toolCalls: calls }
                        : { role: "assistant", content: text }
                );
                continue;
            }

            for (const block of turn.content) {
                if (block.type === "text") {
                    out.push({ role: "user", content: block.text });
                } else if (block.type === "tool_result") {
                    const name = toolNames.get(block.tool_use_id);
                    out.push({
                        role: "tool",
                        content: textOf(block.content) ?? "",
                        toolCallId: block.tool_use_id,
                        ...(name !== undefined ? { name } : null),
                    });
                } else {
                    throw new InvalidMessageError(`Unsupported content block '${block.type}' in user turn`);
                }
            }
        }
        return out;
    }
}

type UserBlock = Anthropic.TextBlockParam | Anthropic.ToolResultBlockParam;

function appendUserBlock(messages: Anthropic.MessageParam[], block: UserBlock): void {
    const last = messages[messages.length - 1];
    if (last?.role === "user" && Array.isArray(last.content)) {
        last.content.push(block);
        return;
    }
    messages.push({ role: "user", content: [block] });
}

function assistantTurn(message: MessageInput): Anthropic.MessageParam {
    const calls = message.toolCalls ?? [];
    if (!calls.length) return { role: "assistant", content: message.content ?? "" };

    const blocks: Anthropic.ContentBlockParam[] = [];
    if (message.content) blocks.push({ type: "text", text: message.content });
    for (const call of calls) {
        blocks.push({ type: "tool_use", id: call.id, name: call.name, input: parseInput(call.arguments) });
    }
    return { role: "assistant", content: blocks };
}

/** `tool_use.input` must be an object; unparseable argument text becomes `{}`. */
function parseInput(text: string): Record<string, unknown> {
    try {
        const value: unknown = JSON.parse(text || "{}");
        if (value !== null && typeof value === "object" && !Array.isArray(value)) {
            return Object.fromEntries(Object.entries(value));
        }
    } catch {
        return {};
    }
    return {};
}
