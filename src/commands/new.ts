import { type CommandDefinition } from "./command_system";
import { type ChatContext } from "../chat_runner";

export const newCommand: CommandDefinition<ChatContext> = {
    name: "new",
    description: "Start a new conversation",
    aliases: ["clear"],
    handler: async ({ session, history, systemPrompt, ui }, _args) => {
        session.conversationId = await history.createConversation(session.owner, { systemPrompt });
        ui.printSystem(`Started conversation ${session.conversationId}.`);
    },
};
