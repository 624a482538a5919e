import { type CommandAction, type CommandDefinition } from "./command_system";
import { type ChatContext } from "../chat_runner";

export const exitCommand: CommandDefinition<ChatContext> = {
    name: "exit",
    description: "Exit program",
    aliases: ["quit"],
    handler: async ({ ui }, _args): Promise<CommandAction> => {
        ui.printSystem("Goodbye!");
        return "exit";
    },
};
