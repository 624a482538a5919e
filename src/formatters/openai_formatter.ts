import type {
    ChatCompletionAssistantMessageParam,
    ChatCompletionMessageParam,
    ChatCompletionMessageToolCall,
} from "openai/resources/chat/completions";
import { InvalidMessageError } from "../errors";
import type { MessageInput, ToolCall } from "../history/models";
import { messagesOf, textOf, type FormatterInput, type MessageFormatter } from "./message_formatter";

/** Chat Completions wire shape: one message param per stored message. */
export class OpenAIMessageFormatter implements MessageFormatter<ChatCompletionMessageParam[]> {
    readonly provider = "openai" as const;

    formatMessages(input: FormatterInput): ChatCompletionMessageParam[] {
        return messagesOf(input).map(toWire);
    }

    parseMessages(wire: ChatCompletionMessageParam[]): MessageInput[] {
        const toolNames = new Map<string, string>();
        const out: MessageInput[] = [];

        for (const param of wire) {
            switch (param.role) {
                case "system":
                    out.push({ role: "system", content: textOf(param.content) ?? "" });
                    break;
                case "user":
                    out.push({ role: "user", content: textOf(param.content) ?? "" });
                    break;
                case "assistant": {
                    const calls = (param.tool_calls ?? []).map(fromWireCall);
                    for (const call of calls) toolNames.set(call.id, call.name);
                    const content = textOf(param.content);
                    out.push({
                        role: "assistant",
                        content: calls.length ? content : content ?? "",
                        ...(calls.length ? { toolCalls: calls } : null),
                    });
                    break;
                }
                case "tool": {
                    const name = toolNames.get(param.tool_call_id);
                    out.push({
                        role: "tool",
                        content: textOf(param.content) ?? "",
                        toolCallId: param.tool_call_id,
                        ...(name !== undefined ? { name } : null),
                    });
                    break;
                }
                default:
                    throw new InvalidMessageError(`Unsupported wire role '${param.role}'`);
            }
        }
        return out;
    }
}

function toWire(message: MessageInput): ChatCompletionMessageParam {
    switch (message.role) {
        case "system":
            return { role: "system", content: message.content ?? "" };
        case "user":
            return { role: "user", content: message.content ?? "" };
        case "assistant": {
            const out: ChatCompletionAssistantMessageParam = { role: "assistant", content: message.content };
            if (message.toolCalls?.length) out.tool_calls = message.toolCalls.map(toWireCall);
            return out;
        }
        case "tool":
            return { role: "tool", tool_call_id: message.toolCallId ?? "", content: message.content ?? "" };
    }
}

function toWireCall(call: ToolCall): ChatCompletionMessageToolCall {
    return { id: call.id, type: "function", function: { name: call.name, arguments: call.arguments } };
}

function fromWireCall(call: ChatCompletionMessageToolCall): ToolCall {
    return { id: call.id, name: call.function.name, arguments: call.function.arguments };
}
