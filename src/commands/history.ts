import { type CommandDefinition } from "./command_system";
import { type ChatContext } from "../chat_runner";
import { type Message } from "../history/models";

function formatMessage(message: Message): string {
    const label = message.role === "tool" ? `tool ${message.name ?? ""} [${message.toolCallId ?? ""}]` : message.role;
    const calls = (message.toolCalls ?? []).map((call) => `\n    -> ${call.name}(${call.arguments}) [${call.id}]`);
    return `${label}: ${message.content ?? ""}${calls.join("")}`;
}

export function formatTranscript(messages: readonly Message[]): string {
    if (messages.length === 0) return "(no messages)";
    return messages.map(formatMessage).join("\n");
}

export const historyCommand: CommandDefinition<ChatContext> = {
    name: "history",
    description: "Show the current conversation, or only its last messages",
    usage: "[count]",
    handler: async ({ session, history, ui }, args) => {
        const limit = args[0] === undefined ? undefined : Number(args[0]);
        if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
            ui.printError(`Expected a message count, got '${args[0]}'.`);
            return;
        }
        const messages = await history.getMessages(session.conversationId, { limit });
        ui.printSystem(`Conversation ${session.conversationId}\n\n${formatTranscript(messages)}`);
    },
};
