import { type CommandAction, type CommandSystem } from "./commands/command_system";
import { type ChatUI } from "./cli_ui";
import { describeError } from "./errors";
import { type HistoryManager } from "./history/history_manager";
import { type MessageInput } from "./history/models";
import { type ToolOrchestrator } from "./orchestrator/tool_orchestrator";
import { type ToolRegistry } from "./tools/tool_registry";
import { type UsageTracker } from "./usage/usage_tracker";

/** The conversation the REPL is talking in; commands may switch it. */
export interface ChatSession {
    owner: string;
    conversationId: string;
}

export interface TextGenerator {
    generateText(messages: readonly MessageInput[], options?: { maxTokens?: number }): Promise<string>;
}

export type ChatContext = {
    session: ChatSession;
    history: HistoryManager;
    registry: ToolRegistry;
    usage: UsageTracker;
    textGenerator: TextGenerator;
    ui: ChatUI;
    systemPrompt: string;
};

export type ChatRunnerOptions = ChatContext & {
    orchestrator: ToolOrchestrator;
    commandSystem: CommandSystem<ChatContext>;
};

/**
 * Opens the conversation a REPL starts in: the given id when it exists,
 * otherwise a fresh conversation seeded with the system prompt.
 */
export async function openSession(
    history: HistoryManager,
    owner: string,
    systemPrompt: string,
    conversationId?: string
): Promise<ChatSession> {
    if (conversationId) {
        await history.getConversation(conversationId);
        return { owner, conversationId };
    }
    return { owner, conversationId: await history.createConversation(owner, { systemPrompt }) };
}

export class ChatRunner {
    private readonly ctx: ChatContext;
    private readonly orchestrator: ToolOrchestrator;
    private readonly commandSystem: CommandSystem<ChatContext>;

    constructor(options: ChatRunnerOptions) {
        const { orchestrator, commandSystem, ...ctx } = options;
        this.ctx = ctx;
        this.orchestrator = orchestrator;
        this.commandSystem = commandSystem;
    }

    get session(): ChatSession {
        return this.ctx.session;
    }

    /** Blank input resolves null. */
    private async promptUserInput(): Promise<string | null> {
        const userInput = await this.ctx.ui.promptUser();
        if (!userInput.trim()) {
            console.log();
            return null;
        }
        return userInput;
    }

    /**
     * Sends one user turn through the orchestrator and prints the reply.
     * Tool calls are printed by the orchestrator's hook as they complete.
     */
    async handleUserInput(userInput: string): Promise<void> {
        this.ctx.ui.printThinking();
        const reply = await this.orchestrator.respond(this.ctx.session.conversationId, userInput);
        this.ctx.ui.printAssistant(reply);
    }

    /**
     * Reads input until a command asks to exit. Commands win over chat text;
     * a failed turn is printed and the loop keeps reading.
     */
    async run(): Promise<void> {
        while (true) {
            try {
                const userInput = await this.promptUserInput();
                if (userInput == null) continue;

                const action: CommandAction | null = await this.commandSystem.tryHandle(userInput, this.ctx);
                if (action) {
                    if (action === "exit") break;
                    continue;
                }

                await this.handleUserInput(userInput);
            } catch (err) {
                this.ctx.ui.printError(describeError(err));
            }
        }
    }
}
