import { ProjectStore, registerProjectTools } from "./bot/projects";
import { type ChatContext } from "./chat_runner";
import { CommandSystem } from "./commands/command_system";
import { contextCommand } from "./commands/context";
import { exitCommand } from "./commands/exit";
import { historyCommand } from "./commands/history";
import { newCommand } from "./commands/new";
import { switchCommand } from "./commands/switch";
import { titleCommand } from "./commands/title";
import { toolsCommand } from "./commands/tools";
import { usageCommand } from "./commands/usage";
import { type AppConfig } from "./config/app_config";
import { HistoryManager } from "./history/history_manager";
import { createStorageBackend } from "./history/storage/storage";
import { type TrimOptions } from "./history/trimming";
import { registerGetTimeTool } from "./tools/get_time";
import { ToolRegistry } from "./tools/tool_registry";

/** Registry shared by the CLI and the bot: the clock plus the project tools. */
export function createToolRegistry(projects: ProjectStore = new ProjectStore()): ToolRegistry {
    const registry = new ToolRegistry();
    registerGetTimeTool(registry);
    registerProjectTools(registry, projects);
    return registry;
}

export function createHistoryManager(config: AppConfig): HistoryManager {
    const storage = createStorageBackend(config.history.storage, {
        dir: config.history.dir,
        dbPath: config.history.dbPath,
    });
    return new HistoryManager(storage);
}

export function trimOptionsFrom(config: AppConfig): TrimOptions {
    return { limit: config.history.messageLimit, tokenBudget: config.history.tokenBudget };
}

export function createCommandSystem(output?: (text: string) => void): CommandSystem<ChatContext> {
    return new CommandSystem<ChatContext>({ prefix: "/", helpHeader: "Available commands:", output })
        .register(toolsCommand)
        .register(newCommand)
        .register(historyCommand)
        .register(contextCommand)
        .register(switchCommand)
        .register(titleCommand)
        .register(usageCommand)
        .register(exitCommand);
}
