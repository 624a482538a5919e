import type { ChatUI } from "../../src/cli_ui";

/** ChatUI that records what would have been printed. */
export class RecordingUI implements ChatUI {
    readonly system: string[] = [];
    readonly errors: string[] = [];
    readonly assistant: string[] = [];
    readonly toolCalls: string[] = [];
    readonly inputs: string[];
    thinking = 0;
    suspended = 0;
    resumed = 0;

    constructor(inputs: string[] = []) {
        this.inputs = [...inputs];
    }

    printBanner(): void {}

    async promptUser(): Promise<string> {
        return this.inputs.shift() ?? "/exit";
    }

    printThinking(): void {
        this.thinking++;
    }

    printAssistant(text: string): void {
        this.assistant.push(text);
    }

    printToolCall(name: string, argText: string): void {
        this.toolCalls.push(`${name} ${argText}`);
    }

    printToolResult(name: string, output: string, ok: boolean): void {
        this.toolCalls.push(`${name} ${ok ? "ok" : "failed"}: ${output}`);
    }

    printSystem(text: string): void {
        this.system.push(text);
    }

    printError(text: string): void {
        this.errors.push(text);
    }

    suspendPrompt(): void {
        this.suspended++;
    }

    resumePrompt(): void {
        this.resumed++;
    }

    close(): void {}
}
