import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import sqlite3, { type Database } from "sqlite3";
import { z } from "zod";
import { StorageError } from "../../errors";
import { getLogger } from "../../logger";
import { compareByRecency, decodeConversation, type Conversation, type ConversationSummary } from "../models";
import type { StorageBackend } from "./storage";

const logger = getLogger("history.sqlite_storage");

const summaryRowSchema = z.object({
    id: z.string(),
    owner: z.string(),
    message_count: z.number(),
    created_at: z.string(),
    updated_at: z.string(),
});

const documentRowSchema = z.object({ document: z.string() });

const SCHEMA = [
    `CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        message_count INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        document TEXT NOT NULL
    )`,
    "CREATE INDEX IF NOT EXISTS idx_conversations_owner ON conversations(owner)",
    "CREATE INDEX IF NOT EXISTS idx_conversations_updated ON conversations(updated_at DESC)",
];

function exec(db: Database, sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
        db.run(sql, (err: Error | null) => (err ? reject(err) : resolve()));
    });
}

/**
 * Database backend: one row per conversation holding the JSON document, with
 * owner and timestamps copied into indexed columns for listings.
 */
export class SqliteStorage implements StorageBackend {
    private db: Promise<Database> | null = null;

    constructor(private readonly dbPath: string) {}

    async load(conversationId: string): Promise<Conversation | undefined> {
        const row = await this.get("SELECT document FROM conversations WHERE id = ?", [conversationId]);
        if (row === undefined) return undefined;

        const parsedRow = documentRowSchema.safeParse(row);
        if (!parsedRow.success) throw new StorageError(`Malformed row for conversation ${conversationId}`);

        let json: unknown;
        try {
            json = JSON.parse(parsedRow.data.document);
        } catch (error) {
            throw new StorageError(`Failed to parse conversation ${conversationId}`, error);
        }
        const decoded = decodeConversation(json);
        if (!decoded.ok) throw new StorageError(`Malformed conversation ${conversationId}: ${decoded.error}`);
        return decoded.conversation;
    }

    async save(conversation: Conversation): Promise<void> {
        await this.run(
            `INSERT INTO conversations (id, owner, message_count, created_at, updated_at, document)
             VALUES (?, ?, ?, ?, ?, ?)
             ON CONFLICT(id) DO UPDATE SET
                owner = excluded.owner,
                message_count = excluded.message_count,
                updated_at = excluded.updated_at,
                document = excluded.document`,
            [
                conversation.id,
                conversation.owner,
                conversation.messages.length,
                conversation.createdAt,
                conversation.updatedAt,
                JSON.stringify(conversation),
            ]
        );
    }

    async delete(conversationId: string): Promise<void> {
        await this.run("DELETE FROM conversations WHERE id = ?", [conversationId]);
    }

    async list(owner?: string): Promise<ConversationSummary[]> {
        const columns = "SELECT id, owner, message_count, created_at, updated_at FROM conversations";
        const rows =
            owner === undefined
                ? await this.all(columns, [])
                : await this.all(`${columns} WHERE owner = ?`, [owner]);

        const out: ConversationSummary[] = [];
        for (const row of rows) {
            const parsed = summaryRowSchema.safeParse(row);
            if (!parsed.success) {
                logger.warn({ row, issues: parsed.error.issues }, "skipping malformed conversation row");
                continue;
            }
            out.push({
                id: parsed.data.id,
                owner: parsed.data.owner,
                messageCount: parsed.data.message_count,
                createdAt: parsed.data.created_at,
                updatedAt: parsed.data.updated_at,
            });
        }
        return out.sort(compareByRecency);
    }

    async close(): Promise<void> {
        if (!this.db) return;
        const pending = this.db;
        this.db = null;
        const db = await pending;
        await new Promise<void>((resolve, reject) => {
            db.close((err) => (err ? reject(new StorageError("Failed to close database", err)) : resolve()));
        });
    }

    private connection(): Promise<Database> {
        if (this.db) return this.db;
        const opening = this.open();
        this.db = opening;
        // A failed open is retried by the next call.
        void opening.catch(() => {
            if (this.db === opening) this.db = null;
        });
        return opening;
    }

    private async open(): Promise<Database> {
        if (this.dbPath !== ":memory:") {
            try {
                await mkdir(dirname(this.dbPath), { recursive: true });
            } catch (error) {
                throw new StorageError(`Failed to create directory for ${this.dbPath}`, error);
            }
        }
        const db = await new Promise<Database>((resolve, reject) => {
            const opened = new sqlite3.Database(this.dbPath, (err) => {
                if (err) reject(new StorageError(`Failed to open database ${this.dbPath}`, err));
                else resolve(opened);
            });
        });

        try {
            for (const statement of SCHEMA) await exec(db, statement);
        } catch (error) {
            await new Promise<void>((resolve) => {
                db.close((closeErr) => {
                    if (closeErr) logger.warn({ err: closeErr, path: this.dbPath }, "failed to close database");
                    resolve();
                });
            });
            throw new StorageError(`Failed to create schema in ${this.dbPath}`, error);
        }
        logger.debug({ path: this.dbPath }, "database ready");
        return db;
    }

    private async run(sql: string, params: unknown[]): Promise<void> {
        const db = await this.connection();
        await new Promise<void>((resolve, reject) => {
            db.run(sql, params, (err: Error | null) => {
                if (err) reject(new StorageError("Database write failed", err));
                else resolve();
            });
        });
    }

    private async get(sql: string, params: unknown[]): Promise<unknown> {
        const db = await this.connection();
        return new Promise<unknown>((resolve, reject) => {
            db.get(sql, params, (err: Error | null, row: unknown) => {
                if (err) reject(new StorageError("Database read failed", err));
                else resolve(row);
            });
        });
    }

    private async all(sql: string, params: unknown[]): Promise<unknown[]> {
        const db = await this.connection();
        return new Promise<unknown[]>((resolve, reject) => {
            db.all(sql, params, (err: Error | null, rows: unknown[]) => {
                if (err) reject(new StorageError("Database read failed", err));
                else resolve(rows);
            });
        });
    }
}
