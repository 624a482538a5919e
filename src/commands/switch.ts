import { select } from "@inquirer/prompts";
import { type ChatContext } from "../chat_runner";
import { formatConversationLabel } from "../cli_ui";
import { type CommandDefinition } from "./command_system";

export const switchCommand: CommandDefinition<ChatContext> = {
    name: "switch",
    description: "Switch to another of your conversations",
    usage: "[id]",
    handler: async ({ session, history, ui }, args) => {
        const requested = args[0];
        if (requested) {
            await history.getConversation(requested);
            session.conversationId = requested;
            ui.printSystem(`Switched to conversation ${requested}.`);
            return;
        }

        const summaries = await history.listConversations(session.owner);
        const others = summaries.filter((summary) => summary.id !== session.conversationId);
        if (others.length === 0) {
            ui.printSystem("No other conversations.");
            return;
        }

        const choices: { name: string; value: string; description: string }[] = [];
        for (const summary of others) {
            const context = await history.getContext(summary.id);
            choices.push({ name: formatConversationLabel(summary, context.title), value: summary.id, description: summary.id });
        }

        ui.suspendPrompt();
        try {
            session.conversationId = await select<string>({ message: "Select a conversation", choices });
        } finally {
            ui.resumePrompt();
        }
        ui.printSystem(`Switched to conversation ${session.conversationId}.`);
    },
};
