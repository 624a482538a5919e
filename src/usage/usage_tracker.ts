import type { TokenUsage } from "../llm_client";

export interface UsageEvent {
    conversationId: string;
    model: string;
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
    timestamp: string;
}

export interface UsageFilter {
    conversationId?: string;
    model?: string;
}

export interface ModelUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
    eventCount: number;
}

export interface UsageSummary extends ModelUsage {
    byModel: Record<string, ModelUsage>;
}

export interface UsageTracker {
    track(event: UsageEvent): void;
    summarize(filter?: UsageFilter): UsageSummary;
}

export function createUsageEvent(conversationId: string, usage: TokenUsage, timestamp = new Date()): UsageEvent {
    return Object.freeze({
        conversationId,
        model: usage.model,
        promptTokens: usage.promptTokens,
        completionTokens: usage.completionTokens,
        totalTokens: usage.totalTokens,
        timestamp: timestamp.toISOString(),
    });
}

function emptyUsage(): ModelUsage {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0, eventCount: 0 };
}

function add(target: ModelUsage, event: UsageEvent): void {
    target.promptTokens += event.promptTokens;
    target.completionTokens += event.completionTokens;
    target.totalTokens += event.totalTokens;
    target.eventCount += 1;
}

/** Discards events. */
export class NoOpUsageTracker implements UsageTracker {
    track(_event: UsageEvent): void {}

    summarize(): UsageSummary {
        return { ...emptyUsage(), byModel: {} };
    }
}

/** Append-only in-process event log. */
export class InMemoryUsageTracker implements UsageTracker {
    private readonly events: UsageEvent[] = [];

    track(event: UsageEvent): void {
        this.events.push(Object.freeze({ ...event }));
    }

    list(filter: UsageFilter = {}): readonly UsageEvent[] {
        return this.events.filter(
            (event) =>
                (filter.conversationId === undefined || event.conversationId === filter.conversationId) &&
                (filter.model === undefined || event.model === filter.model)
        );
    }

    summarize(filter: UsageFilter = {}): UsageSummary {
        const total = emptyUsage();
        const byModel: Record<string, ModelUsage> = {};
        for (const event of this.list(filter)) {
            add(total, event);
            const perModel = byModel[event.model] ?? emptyUsage();
            add(perModel, event);
            byModel[event.model] = perModel;
        }
        return { ...total, byModel };
    }
}
