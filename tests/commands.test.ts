import { describe, expect, it, vi } from "vitest";
import { createCommandSystem } from "../src/bootstrap";
import { ChatRunner, openSession, type ChatContext, type TextGenerator } from "../src/chat_runner";
import { CommandSystem } from "../src/commands/command_system";
import { cleanTitle, generateTitle } from "../src/commands/title";
import { formatToolList } from "../src/commands/tools";
import { formatUsage } from "../src/commands/usage";
import { ConversationNotFoundError } from "../src/errors";
import { HistoryManager } from "../src/history/history_manager";
import { MemoryStorage } from "../src/history/storage/memory_storage";
import { ToolOrchestrator } from "../src/orchestrator/tool_orchestrator";
import { ToolRegistry } from "../src/tools/tool_registry";
import { InMemoryUsageTracker, createUsageEvent } from "../src/usage/usage_tracker";
import { RecordingUI } from "./helpers/recording_ui";
import { ScriptedClient, text } from "./helpers/scripted_client";

function echoRegistry(): ToolRegistry {
    return new ToolRegistry()
        .register(
            { name: "echo", description: "Echo the given text", parameters: { text: { type: "string" } } },
            (args) => args.text
        )
        .register(
            { name: "greet", description: "Greet someone", parameters: { name: { type: "string", required: false } } },
            () => "hello"
        );
}

async function createContext(textGenerator: TextGenerator = { generateText: async () => "" }) {
    let n = 0;
    const history = new HistoryManager(new MemoryStorage(), { generateId: () => `conv-${++n}` });
    const session = await openSession(history, "cli:test", "sys");
    const ui = new RecordingUI();
    const ctx: ChatContext = {
        session,
        history,
        registry: echoRegistry(),
        usage: new InMemoryUsageTracker(),
        textGenerator,
        ui,
        systemPrompt: "sys",
    };
    return { ctx, ui, history };
}

describe("CommandSystem", () => {
    it("parses commands and ignores plain text", () => {
        const commands = new CommandSystem<void>();
        expect(commands.parse("/History  3 ")).toEqual({ name: "history", args: ["3"] });
        expect(commands.parse("hello")).toBeNull();
    });

    it("prints help for the bare prefix and a notice for unknown commands", async () => {
        const output: string[] = [];
        const commands = new CommandSystem<void>({ output: (t) => output.push(t) }).register({
            name: "exit",
            description: "Exit program",
            aliases: ["Quit"],
            handler: () => "exit",
        });

        await expect(commands.tryHandle("/", undefined)).resolves.toBe("continue");
        await expect(commands.tryHandle("/nope", undefined)).resolves.toBe("continue");
        await expect(commands.tryHandle("/ex", undefined)).resolves.toBe("continue");
        await expect(commands.tryHandle("/quit", undefined)).resolves.toBe("exit");
        await expect(commands.tryHandle("just text", undefined)).resolves.toBeNull();

        expect(output).toEqual([
            "Available commands:\n  /exit  Exit program (also /quit)",
            "Unknown command: /nope. Type '/' to see available commands.",
            "Unknown command: /ex. Did you mean /exit?",
        ]);
    });

    it("rejects taken names and aliases", () => {
        const commands = new CommandSystem<void>().register({ name: "a", description: "", handler: () => undefined });
        expect(() => commands.register({ name: "A", description: "", handler: () => undefined })).toThrow(
            "/a is already taken by /a"
        );
        expect(() => commands.register({ name: "b", description: "", aliases: ["a"], handler: () => undefined })).toThrow(
            "/a is already taken by /a"
        );
        expect(() => commands.register({ name: "c", description: "", aliases: ["c"], handler: () => undefined })).toThrow(
            "/c is already taken by /c"
        );
        expect(() => commands.register({ name: "two words", description: "", handler: () => undefined })).toThrow(
            "Invalid command name: 'two words'"
        );
    });

    it("lists every chat command with its arguments", () => {
        expect(createCommandSystem().formatHelp().split("\n")).toEqual([
            "Available commands:",
            "  /tools                              List available tools",
            "  /new                                Start a new conversation (also /clear)",
            "  /history [count]                    Show the current conversation, or only its last messages",
            "  /context [key value | clear [key]]  Show or edit the notes sent along with every request",
            "  /switch [id]                        Switch to another of your conversations",
            "  /title                              Generate a short title for this conversation and store it as the 'title' note",
            "  /usage [all]                        Show token usage for this conversation or the whole session",
            "  /exit                               Exit program (also /quit)",
        ]);
    });
});

describe("chat commands", () => {
    it("sets, shows and clears context notes", async () => {
        const { ctx, ui, history } = await createContext();
        const commands = createCommandSystem();

        await commands.tryHandle("/context goal ship it", ctx);
        await commands.tryHandle("/context owner ada", ctx);
        await commands.tryHandle("/context", ctx);
        await commands.tryHandle("/context clear goal", ctx);
        await commands.tryHandle("/context lonely", ctx);

        expect(await history.getContext("conv-1")).toEqual({ owner: "ada" });
        expect(ui.system).toEqual([
            "Saved note 'goal'.",
            "Saved note 'owner'.",
            "Context notes:\n  goal: ship it\n  owner: ada",
            "Removed note 'goal'.",
        ]);
        expect(ui.errors).toEqual(["Usage: /context lonely <value>"]);
    });

    it("starts new conversations and switches back by id", async () => {
        const { ctx, ui } = await createContext();
        const commands = createCommandSystem();

        await commands.tryHandle("/new", ctx);
        expect(ctx.session.conversationId).toBe("conv-2");
        await commands.tryHandle("/clear", ctx);
        expect(ctx.session.conversationId).toBe("conv-3");

        await commands.tryHandle("/switch conv-1", ctx);
        expect(ctx.session.conversationId).toBe("conv-1");
        await expect(commands.tryHandle("/switch missing", ctx)).rejects.toBeInstanceOf(ConversationNotFoundError);
        expect(ui.system.at(-1)).toBe("Switched to conversation conv-1.");
    });

    it("prints the transcript and validates the count", async () => {
        const { ctx, ui, history } = await createContext();
        await history.addMessage("conv-1", "user", "hello");
        const commands = createCommandSystem();

        await commands.tryHandle("/history", ctx);
        await commands.tryHandle("/history 1", ctx);
        await commands.tryHandle("/history x", ctx);

        expect(ui.system).toEqual([
            "Conversation conv-1\n\nsystem: sys\nuser: hello",
            "Conversation conv-1\n\nsystem: sys\nuser: hello",
        ]);
        expect(ui.errors).toEqual(["Expected a message count, got 'x'."]);
    });

    it("stores a generated title as a note", async () => {
        const generateText = vi.fn(async () => '"Project Planning."\n');
        const { ctx, ui, history } = await createContext({ generateText });
        await history.addMessage("conv-1", "user", "Help me plan the project");

        await createCommandSystem().tryHandle("/title", ctx);

        expect(await history.getContext("conv-1")).toEqual({ title: "Project Planning" });
        expect(ui.system).toEqual(["Title: Project Planning"]);
        expect(generateText).toHaveBeenCalledTimes(1);
    });

    it("reports usage for this conversation or the whole session", async () => {
        const { ctx, ui } = await createContext();
        const usage = new InMemoryUsageTracker();
        usage.track(createUsageEvent("conv-1", { model: "m", promptTokens: 8, completionTokens: 2, totalTokens: 10 }));
        usage.track(createUsageEvent("other", { model: "m", promptTokens: 4, completionTokens: 1, totalTokens: 5 }));
        const commands = createCommandSystem();

        await commands.tryHandle("/usage", { ...ctx, usage });
        await commands.tryHandle("/usage all", { ...ctx, usage });

        expect(ui.system).toEqual([
            "Requests: 1\nTokens: 10 (prompt 8, completion 2)\n  m: 10 tokens over 1 request(s)",
            "Requests: 2\nTokens: 15 (prompt 12, completion 3)\n  m: 15 tokens over 2 request(s)",
        ]);
    });

    it("lists tools and exits", async () => {
        const { ctx, ui } = await createContext();
        const commands = createCommandSystem();

        await commands.tryHandle("/tools", ctx);
        await expect(commands.tryHandle("/quit", ctx)).resolves.toBe("exit");
        expect(ui.system).toEqual([formatToolList(ctx.registry.list()), "Goodbye!"]);
    });
});

describe("formatting helpers", () => {
    it("formats tool signatures", () => {
        expect(formatToolList(echoRegistry().list())).toBe(
            "Available tools:\n  - echo(text: string): Echo the given text\n  - greet(name?: string): Greet someone"
        );
        expect(formatToolList([])).toBe("No tools registered.");
    });

    it("formats an empty usage summary", () => {
        expect(formatUsage({ promptTokens: 0, completionTokens: 0, totalTokens: 0, eventCount: 0, byModel: {} })).toBe(
            "Requests: 0\nTokens: 0 (prompt 0, completion 0)"
        );
    });

    it("cleans generated titles", () => {
        expect(cleanTitle("  'Weekly sync notes'  ")).toBe("Weekly sync notes");
        expect(cleanTitle("...")).toBe("Untitled conversation");
        expect(cleanTitle("a".repeat(50))).toBe("a".repeat(40));
    });

    it("skips the model for an empty conversation", async () => {
        const generateText = vi.fn(async () => "unused");
        await expect(generateTitle({ generateText }, [{ role: "system", content: "sys" }])).resolves.toBe(
            "Untitled conversation"
        );
        expect(generateText).not.toHaveBeenCalled();
    });
});

describe("ChatRunner", () => {
    it("routes text to the orchestrator and commands to the command system", async () => {
        const { ctx, ui } = await createContext();
        ui.inputs.push("   ", "/context mood calm", "hello", "/exit");
        const client = new ScriptedClient([text("Hi!")]);
        const orchestrator = new ToolOrchestrator({ registry: ctx.registry, history: ctx.history, client });
        const runner = new ChatRunner({ ...ctx, orchestrator, commandSystem: createCommandSystem() });

        await runner.run();

        expect(ui.assistant).toEqual(["Hi!"]);
        expect(ui.thinking).toBe(1);
        expect(ui.system).toEqual(["Saved note 'mood'.", "Goodbye!"]);
        expect(client.requests[0]?.messages.map((m) => m.content)).toEqual([
            "sys",
            "Conversation notes (key: value):\nmood: calm",
            "hello",
        ]);
    });

    it("prints errors and keeps reading input", async () => {
        const { ctx, ui } = await createContext();
        ui.inputs.push("hello", "/exit");
        const client = new ScriptedClient([new Error("offline")]);
        const orchestrator = new ToolOrchestrator({ registry: ctx.registry, history: ctx.history, client });
        const runner = new ChatRunner({ ...ctx, orchestrator, commandSystem: createCommandSystem() });

        await runner.run();

        expect(ui.errors).toEqual(["AI service request failed: offline"]);
        expect(ui.system).toEqual(["Goodbye!"]);
    });
});
