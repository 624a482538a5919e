import type { AIResponse, AIServiceClient, CompletionRequest } from "../../src/llm_client";

type Step = AIResponse | Error | ((request: CompletionRequest) => AIResponse);

/** Replays a fixed list of responses and records every request it receives. */
export class ScriptedClient implements AIServiceClient {
    readonly requests: CompletionRequest[] = [];
    private readonly steps: Step[];

    constructor(steps: Step[], private readonly fallback?: Step) {
        this.steps = [...steps];
    }

    async complete(request: CompletionRequest): Promise<AIResponse> {
        this.requests.push(structuredClone(request));
        const step = this.steps.shift() ?? this.fallback;
        if (step === undefined) throw new Error("scripted client ran out of responses");
        if (step instanceof Error) throw step;
        return typeof step === "function" ? step(request) : step;
    }
}

export function text(content: string): AIResponse {
    return { type: "text", content };
}

export function toolCall(id: string, name: string, args: string, content: string | null = null): AIResponse {
    return { type: "tool_calls", content, calls: [{ id, name, arguments: args }] };
}
