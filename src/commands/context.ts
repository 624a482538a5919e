import { type CommandDefinition } from "./command_system";
import { type ChatContext } from "../chat_runner";

export const contextCommand: CommandDefinition<ChatContext> = {
    name: "context",
    description: "Show or edit the notes sent along with every request",
    usage: "[key value | clear [key]]",
    handler: async ({ session, history, ui }, args) => {
        const [key, ...rest] = args;
        if (key === undefined) {
            const context = await history.getContext(session.conversationId);
            const lines = Object.entries(context).map(([k, v]) => `  ${k}: ${v}`);
            ui.printSystem(lines.length ? ["Context notes:", ...lines].join("\n") : "No context notes.");
            return;
        }

        if (key === "clear") {
            await history.clearContext(session.conversationId, rest[0]);
            ui.printSystem(rest[0] ? `Removed note '${rest[0]}'.` : "Cleared all context notes.");
            return;
        }

        if (rest.length === 0) {
            ui.printError(`Usage: /context ${key} <value>`);
            return;
        }
        await history.setContext(session.conversationId, key, rest.join(" "));
        ui.printSystem(`Saved note '${key}'.`);
    },
};
