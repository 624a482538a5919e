import * as readline from "node:readline";
import type { ConversationSummary } from "./history/models";

export interface ChatUI {
    printBanner(meta?: { model?: string; conversationId?: string }): void;
    promptUser(): Promise<string>;
    printThinking(): void;
    printAssistant(text: string): void;
    printToolCall(name: string, argText: string): void;
    printToolResult(name: string, output: string, ok: boolean): void;
    printSystem(text: string): void;
    printError(text: string): void;
    /** Releases stdin for interactive prompts run by commands. */
    suspendPrompt(): void;
    resumePrompt(): void;
    close(): void;
}

export interface ClipOptions {
    maxChars?: number;
    maxLines?: number;
}

const ARGUMENT_PREVIEW_CHARS = 120;
const MIN_FRAME_WIDTH = 24;

type Parsed = { ok: true; value: unknown } | { ok: false };

function parseJson(text: string): Parsed {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch {
        return { ok: false };
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function clipLine(text: string, maxChars: number): string {
    return text.length > maxChars ? `${text.slice(0, maxChars)}…` : text;
}

/** Tool-call arguments as `key=value` pairs; anything that is not a JSON object is shown as sent. */
export function formatCallArguments(argText: string): string {
    const trimmed = argText.trim();
    if (!trimmed) return "(no arguments)";
    const parsed = parseJson(trimmed);
    if (!parsed.ok || !isRecord(parsed.value)) return clipLine(trimmed, ARGUMENT_PREVIEW_CHARS);

    const pairs = Object.entries(parsed.value).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return pairs.length ? clipLine(pairs.join(" "), ARGUMENT_PREVIEW_CHARS) : "(no arguments)";
}

/**
 * Tool output as the REPL shows it. Error payloads collapse to `code: message`;
 * successful JSON results are indented.
 */
export function describeToolOutput(output: string, ok: boolean): string {
    const parsed = parseJson(output);
    if (!ok) {
        const error = parsed.ok && isRecord(parsed.value) ? parsed.value.error : undefined;
        if (isRecord(error) && typeof error.code === "string" && typeof error.message === "string") {
            return `${error.code}: ${error.message}`;
        }
        return output;
    }
    return parsed.ok && typeof parsed.value === "object" && parsed.value !== null
        ? JSON.stringify(parsed.value, null, 2)
        : output;
}

/** Cuts long output and says how much was left out. */
export function clipText(text: string, options: ClipOptions = {}): string {
    const maxChars = options.maxChars ?? 1200;
    const maxLines = options.maxLines ?? 30;

    const lines = text.split(/\r?\n/);
    let out = lines.slice(0, maxLines).join("\n");
    const omitted: string[] = [];
    if (lines.length > maxLines) omitted.push(`${lines.length - maxLines} more line(s)`);
    if (out.length > maxChars) {
        omitted.push(`${out.length - maxChars} more character(s)`);
        out = out.slice(0, maxChars);
    }
    return omitted.length ? `${out}\n… ${omitted.join(", ")}` : out;
}

/** One line per conversation for pickers: last update, title note when set, size. */
export function formatConversationLabel(summary: ConversationSummary, title?: string): string {
    const when = summary.updatedAt.slice(0, 16).replace("T", " ");
    return `${when}${title ? ` ${title}` : ""} (${summary.messageCount} messages)`;
}

/** Wraps `body` to `width` columns, breaking at spaces where one is close enough. */
export function wrapText(body: string, width: number): string[] {
    const max = Math.max(MIN_FRAME_WIDTH, width);
    const out: string[] = [];
    for (const raw of body.split(/\r?\n/)) {
        let line = raw;
        while (line.length > max) {
            const space = line.lastIndexOf(" ", max);
            const cut = space > max / 2 ? space : max;
            out.push(line.slice(0, cut));
            line = line.slice(cut).trimStart();
        }
        out.push(line);
    }
    return out;
}

const ANSI = {
    reset: "\x1b[0m",
    bold: "\x1b[1m",
    dim: "\x1b[2m",
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
    blue: "\x1b[34m",
    magenta: "\x1b[35m",
    cyan: "\x1b[36m",
} as const;

type Tone = "assistant" | "user" | "tool" | "ok" | "failed" | "system" | "error";

const TONES: Record<Tone, string> = {
    assistant: ANSI.cyan,
    user: ANSI.blue,
    tool: ANSI.yellow,
    ok: ANSI.green,
    failed: ANSI.red,
    system: ANSI.magenta,
    error: ANSI.red,
};

export class CliUI implements ChatUI {
    private readonly rl: readline.Interface;
    private readonly color = Boolean(process.stdout.isTTY);

    constructor() {
        this.rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: true });
    }

    printBanner(meta?: { model?: string; conversationId?: string }): void {
        const details = [meta?.model && `model=${meta.model}`, meta?.conversationId && `conversation=${meta.conversationId}`]
            .filter(Boolean)
            .join("  ");
        console.log(`${this.label("assistant", "AI Tools CLI")}  ${this.dim(details)}`);
        console.log(this.dim("Type / for help.  /new to start over.  /tools to list tools.  /exit to quit."));
        console.log();
    }

    promptUser(): Promise<string> {
        const prompt = `${this.label("user", "You")}${this.dim(" › ")}`;
        return new Promise((resolve) => this.rl.question(prompt, (answer) => resolve(answer.trim())));
    }

    printThinking(): void {
        console.log(this.dim("…"));
    }

    printAssistant(text: string): void {
        this.frame("assistant", "AI", text);
    }

    printToolCall(name: string, argText: string): void {
        console.log(`${this.label("tool", `🔧 ${name}`)} ${this.dim(formatCallArguments(argText))}`);
    }

    printToolResult(name: string, output: string, ok: boolean): void {
        const title = ok ? `${name} returned` : `${name} failed`;
        this.frame(ok ? "ok" : "failed", title, clipText(describeToolOutput(output, ok)));
    }

    printSystem(text: string): void {
        this.frame("system", "System", text);
    }

    printError(text: string): void {
        this.frame("error", "Error", text);
    }

    suspendPrompt(): void {
        this.rl.pause();
    }

    resumePrompt(): void {
        this.rl.resume();
    }

    close(): void {
        this.rl.close();
    }

    private paint(code: string, text: string): string {
        return this.color ? `${code}${text}${ANSI.reset}` : text;
    }

    private dim(text: string): string {
        return this.paint(ANSI.dim, text);
    }

    private label(tone: Tone, text: string): string {
        return this.paint(ANSI.bold, this.paint(TONES[tone], text));
    }

    private frame(tone: Tone, title: string, body: string): void {
        const width = (process.stdout.columns ?? 100) - 4;
        console.log(`${this.dim("┌─")} ${this.label(tone, title)}`);
        for (const line of wrapText(body, width)) console.log(`${this.dim("│")} ${line}`);
        console.log(this.dim("└─"));
        console.log();
    }
}
