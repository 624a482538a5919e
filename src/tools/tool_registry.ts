/**
 * Registry of callable tools for OpenAI-style function calling.
 *
 * Notes:
 * - Registration happens once at startup; `execute` may then run concurrently.
 * - Arguments are validated against the descriptor before the handler runs, so
 *   a handler never sees a missing required field or a wrong type.
 */

import type { ChatCompletionTool } from "openai/resources/chat/completions";
import { z, type ZodTypeAny } from "zod";
import {
    DuplicateToolError,
    InvalidArgumentsError,
    SchemaMismatchError,
    ToolExecutionError,
    UnknownToolError,
} from "../errors";
import { logToolExecution } from "../logger";

export const PARAMETER_TYPES = ["string", "integer", "number", "boolean", "object", "array"] as const;
export type ParameterType = (typeof PARAMETER_TYPES)[number];

export interface ParameterSpec {
    type: ParameterType;
    /** Defaults to true. */
    required?: boolean;
    description?: string;
    enum?: readonly (string | number)[];
    /** Element type, arrays only. */
    items?: { type: ParameterType };
}

export interface ToolDescriptor {
    name: string;
    description: string;
    parameters: Record<string, ParameterSpec>;
}

export type ToolArgs = Record<string, unknown>;

/** Handlers receive one validated arguments object. */
export type ToolHandler = (args: ToolArgs) => unknown;

export interface RegisteredTool {
    readonly descriptor: Readonly<ToolDescriptor>;
    readonly handler: ToolHandler;
}

interface ToolEntry extends RegisteredTool {
    readonly validator: z.ZodType<ToolArgs>;
}

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;
const PARAMETER_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export class ToolRegistry {
    private readonly tools = new Map<string, ToolEntry>();

    register(descriptor: ToolDescriptor, handler: ToolHandler): this {
        const name = descriptor.name.trim();
        if (this.tools.has(name)) throw new DuplicateToolError(name);

        const frozen = freezeDescriptor({ ...descriptor, name });
        checkDescriptor(frozen);
        if (handler.length > 1) {
            throw new SchemaMismatchError(
                name,
                `handler declares ${handler.length} positional parameters; expected a single arguments object`
            );
        }

        this.tools.set(name, { descriptor: frozen, handler, validator: buildValidator(frozen) });
        return this;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    get(name: string): RegisteredTool | undefined {
        const entry = this.tools.get(name);
        return entry ? { descriptor: entry.descriptor, handler: entry.handler } : undefined;
    }

    get size(): number {
        return this.tools.size;
    }

    /** Descriptors in registration order. */
    list(): Readonly<ToolDescriptor>[] {
        return Array.from(this.tools.values(), (entry) => entry.descriptor);
    }

    /** One OpenAI function schema per tool, in registration order. */
    exportSchemas(): ChatCompletionTool[] {
        return this.list().map((descriptor) => ({
            type: "function",
            function: {
                name: descriptor.name,
                description: descriptor.description,
                parameters: toJsonSchema(descriptor),
            },
        }));
    }

    async execute(name: string, args: unknown): Promise<unknown> {
        const entry = this.tools.get(name);
        if (!entry) throw new UnknownToolError(name);

        const parsed = entry.validator.safeParse(args ?? {});
        if (!parsed.success) {
            throw new InvalidArgumentsError(
                name,
                parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            );
        }

        let result: unknown;
        try {
            result = await entry.handler(parsed.data);
        } catch (err) {
            logToolExecution(name, parsed.data, undefined);
            throw new ToolExecutionError(name, err);
        }
        logToolExecution(name, parsed.data, result);
        return result;
    }
}

function freezeDescriptor(descriptor: ToolDescriptor): Readonly<ToolDescriptor> {
    const parameters: Record<string, ParameterSpec> = {};
    for (const [key, spec] of Object.entries(descriptor.parameters)) {
        parameters[key] = Object.freeze({ ...spec });
    }
    return Object.freeze({ ...descriptor, parameters: Object.freeze(parameters) });
}

function isParameterType(value: unknown): value is ParameterType {
    return typeof value === "string" && (PARAMETER_TYPES as readonly string[]).includes(value);
}

function checkDescriptor(descriptor: Readonly<ToolDescriptor>): void {
    const { name } = descriptor;
    if (!TOOL_NAME_PATTERN.test(name)) {
        throw new SchemaMismatchError(name, "name must match ^[a-zA-Z0-9_-]{1,64}$");
    }
    if (typeof descriptor.description !== "string" || !descriptor.description.trim()) {
        throw new SchemaMismatchError(name, "description cannot be empty");
    }

    for (const [param, spec] of Object.entries(descriptor.parameters)) {
        if (!PARAMETER_NAME_PATTERN.test(param)) {
            throw new SchemaMismatchError(name, `invalid parameter name '${param}'`);
        }
        if (!isParameterType(spec.type)) {
            throw new SchemaMismatchError(name, `parameter '${param}' has unsupported type '${String(spec.type)}'`);
        }
        if (spec.items) {
            if (spec.type !== "array") {
                throw new SchemaMismatchError(name, `parameter '${param}' declares items but is not an array`);
            }
            if (!isParameterType(spec.items.type)) {
                throw new SchemaMismatchError(name, `parameter '${param}' has unsupported item type`);
            }
        }
        if (spec.enum) {
            const misfit = spec.enum.find((value) => !fitsType(value, spec.type));
            if (spec.enum.length === 0 || misfit !== undefined) {
                throw new SchemaMismatchError(name, `parameter '${param}' enum does not fit type '${spec.type}'`);
            }
        }
    }
}

function fitsType(value: string | number, type: ParameterType): boolean {
    switch (type) {
        case "string":
            return typeof value === "string";
        case "number":
            return typeof value === "number";
        case "integer":
            return typeof value === "number" && Number.isInteger(value);
        default:
            return false;
    }
}

function typeValidator(type: ParameterType, items?: { type: ParameterType }): ZodTypeAny {
    switch (type) {
        case "string":
            return z.string();
        case "integer":
            return z.number().int();
        case "number":
            return z.number();
        case "boolean":
            return z.boolean();
        case "object":
            return z.record(z.unknown());
        case "array":
            return z.array(items ? typeValidator(items.type) : z.unknown());
    }
}

function buildValidator(descriptor: Readonly<ToolDescriptor>): z.ZodType<ToolArgs> {
    const shape: Record<string, ZodTypeAny> = {};
    for (const [param, spec] of Object.entries(descriptor.parameters)) {
        let field = typeValidator(spec.type, spec.items);
        const allowed = spec.enum;
        if (allowed) {
            field = field.refine((value) => allowed.includes(value), {
                message: `Expected one of ${allowed.map((v) => JSON.stringify(v)).join(", ")}`,
            });
        }
        shape[param] = spec.required === false ? field.optional() : field;
    }
    return z.object(shape).strict();
}

function toJsonSchema(descriptor: Readonly<ToolDescriptor>): Record<string, unknown> {
    const properties: Record<string, Record<string, unknown>> = {};
    const required: string[] = [];
    for (const [param, spec] of Object.entries(descriptor.parameters)) {
        properties[param] = {
            type: spec.type,
            ...(spec.description ? { description: spec.description } : null),
            ...(spec.enum ? { enum: [...spec.enum] } : null),
            ...(spec.items ? { items: { type: spec.items.type } } : null),
        };
        if (spec.required !== false) required.push(param);
    }
    return {
        type: "object",
        properties,
        required,
        additionalProperties: false,
    };
}
