import { type ChatContext } from "../chat_runner";
import { type UsageSummary } from "../usage/usage_tracker";
import { type CommandDefinition } from "./command_system";

export function formatUsage(summary: UsageSummary): string {
    const lines = [
        `Requests: ${summary.eventCount}`,
        `Tokens: ${summary.totalTokens} (prompt ${summary.promptTokens}, completion ${summary.completionTokens})`,
    ];
    for (const [model, usage] of Object.entries(summary.byModel)) {
        lines.push(`  ${model}: ${usage.totalTokens} tokens over ${usage.eventCount} request(s)`);
    }
    return lines.join("\n");
}

export const usageCommand: CommandDefinition<ChatContext> = {
    name: "usage",
    description: "Show token usage for this conversation or the whole session",
    usage: "[all]",
    handler: async ({ session, usage, ui }, args) => {
        const filter = args[0] === "all" ? {} : { conversationId: session.conversationId };
        ui.printSystem(formatUsage(usage.summarize(filter)));
    },
};
