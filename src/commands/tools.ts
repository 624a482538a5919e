import { type CommandDefinition } from "./command_system";
import { type ChatContext } from "../chat_runner";
import { type ToolDescriptor } from "../tools/tool_registry";

export function formatToolList(tools: readonly Readonly<ToolDescriptor>[]): string {
    if (tools.length === 0) return "No tools registered.";
    const lines = tools.map((t) => {
        const params = Object.entries(t.parameters)
            .map(([name, spec]) => `${name}${spec.required === false ? "?" : ""}: ${spec.type}`)
            .join(", ");
        return `  - ${t.name}(${params}): ${t.description}`;
    });
    return ["Available tools:", ...lines].join("\n");
}

export const toolsCommand: CommandDefinition<ChatContext> = {
    name: "tools",
    description: "List available tools",
    handler: async ({ ui, registry }) => {
        ui.printSystem(formatToolList(registry.list()));
    },
};
