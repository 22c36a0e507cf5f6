import { Logger } from '@nestjs/common';
import { Pool, PoolClient, PoolConfig } from 'pg';
import { DEFAULT_WELCOME_MESSAGE } from '../app.constants';
import {
    IContentStep,
    IContentStepInput,
    IContentStepPatch,
    IMediaRef,
    IMenuNode,
    IMenuNodeInput,
    IMenuStorage,
    IPostgresConnectionOptions,
} from '../app.interface';
import { MenuNodeNotFoundError, StorageNotReadyError } from '../errors';
import { MENU_SCHEMA_STATEMENTS, SEED_WELCOME_STATEMENT } from './postgres.schema';
import {
    buildNodeToken,
    clampInsertPosition,
    isExistingPosition,
    stepKindOf,
    toMediaRef,
} from './storage.utils';

export type TPostgresPool = Pick<Pool, 'query' | 'connect' | 'end'>;

export interface PostgresStorageDependencies {
    poolFactory?: (config: PoolConfig) => TPostgresPool;
    logger?: Logger;
    welcomeMessage?: string;
}

type TMenuNodeRow = {
    id: number;
    label: string;
    callback_token: string | null;
    body: string | null;
    parent_id: number | null;
    file_id: string | null;
    file_type: string | null;
    delay: number | null;
    created_at: Date;
};

type TContentStepRow = {
    id: number;
    node_id: number;
    position: number;
    content_text: string | null;
    file_id: string | null;
    file_type: string | null;
    delay: number | null;
    created_at: Date;
};

type TCountRow = {
    count: number;
};

const NODE_COLUMNS =
    'id, label, callback_token, body, parent_id, file_id, file_type, delay, created_at';
const STEP_COLUMNS =
    'id, node_id, position, content_text, file_id, file_type, delay, created_at';

export class PostgresStorage implements IMenuStorage {
    private readonly logger: Logger;
    private readonly poolFactory: (config: PoolConfig) => TPostgresPool;
    private readonly welcomeMessage: string;
    private pool?: TPostgresPool;

    constructor(
        private readonly options: IPostgresConnectionOptions,
        dependencies: PostgresStorageDependencies = {},
    ) {
        this.logger = dependencies.logger ?? new Logger(PostgresStorage.name);
        this.poolFactory =
            dependencies.poolFactory ?? ((config) => new Pool(config));
        this.welcomeMessage =
            dependencies.welcomeMessage ?? DEFAULT_WELCOME_MESSAGE;
    }

    /**
     * Opens the pool, applies the schema and seeds the welcome row. Calling it
     * again on a ready storage is a no-op.
     */
    public async init(): Promise<void> {
        if (this.pool) {
            return;
        }

        const pool = this.poolFactory({
            host: this.options.host,
            port: this.options.port,
            database: this.options.database,
            user: this.options.user,
            password: this.options.password,
            min: this.options.poolMin ?? 1,
            max: this.options.poolMax ?? 10,
        });

        try {
            for (const statement of MENU_SCHEMA_STATEMENTS) {
                await pool.query(statement);
            }
            await pool.query(SEED_WELCOME_STATEMENT, [this.welcomeMessage]);
        } catch (error) {
            await pool.end();
            throw error;
        }

        this.pool = pool;
        this.logger.log(
            `Connected to ${this.options.host}:${this.options.port}/${this.options.database}`,
        );
    }

    public async close(): Promise<void> {
        const pool = this.pool;
        this.pool = undefined;
        if (pool) {
            await pool.end();
        }
    }

    public async createNode(input: IMenuNodeInput): Promise<IMenuNode> {
        return this.withTransaction((client) => this.insertNode(client, input));
    }

    public async createNodeWithSteps(
        input: IMenuNodeInput,
        steps: IContentStepInput[],
    ): Promise<IMenuNode> {
        return this.withTransaction(async (client) => {
            const node = await this.insertNode(client, input);
            for (const [index, step] of steps.entries()) {
                await this.insertStepRow(client, node.id, index + 1, step);
            }
            return node;
        });
    }

    public async getNode(id: number): Promise<IMenuNode | undefined> {
        const result = await this.getPool().query<TMenuNodeRow>(
            `SELECT ${NODE_COLUMNS} FROM menu_nodes WHERE id = $1`,
            [id],
        );
        const row = result.rows[0];
        return row ? this.toNode(row) : undefined;
    }

    public async listChildren(parentId: number | null): Promise<IMenuNode[]> {
        const result =
            parentId === null
                ? await this.getPool().query<TMenuNodeRow>(
                      `SELECT ${NODE_COLUMNS} FROM menu_nodes WHERE parent_id IS NULL ORDER BY id`,
                  )
                : await this.getPool().query<TMenuNodeRow>(
                      `SELECT ${NODE_COLUMNS} FROM menu_nodes WHERE parent_id = $1 ORDER BY id`,
                      [parentId],
                  );
        return result.rows.map((row) => this.toNode(row));
    }

    public async listNodes(): Promise<IMenuNode[]> {
        const result = await this.getPool().query<TMenuNodeRow>(
            `SELECT ${NODE_COLUMNS} FROM menu_nodes ORDER BY id`,
        );
        return result.rows.map((row) => this.toNode(row));
    }

    public async updateNodeLabel(id: number, label: string): Promise<boolean> {
        return this.execute('UPDATE menu_nodes SET label = $2 WHERE id = $1', [
            id,
            label,
        ]);
    }

    public async updateNodeBody(
        id: number,
        body: string | null,
    ): Promise<boolean> {
        return this.execute('UPDATE menu_nodes SET body = $2 WHERE id = $1', [
            id,
            body,
        ]);
    }

    public async setNodeMedia(
        id: number,
        media: IMediaRef | null,
    ): Promise<boolean> {
        return this.execute(
            'UPDATE menu_nodes SET file_id = $2, file_type = $3 WHERE id = $1',
            [id, media?.fileId ?? null, media?.kind ?? null],
        );
    }

    public async deleteNode(id: number): Promise<boolean> {
        return this.execute('DELETE FROM menu_nodes WHERE id = $1', [id]);
    }

    public async listSteps(nodeId: number): Promise<IContentStep[]> {
        const result = await this.getPool().query<TContentStepRow>(
            `SELECT ${STEP_COLUMNS} FROM menu_steps WHERE node_id = $1 ORDER BY position`,
            [nodeId],
        );
        return result.rows.map((row) => this.toStep(row));
    }

    public async listStepsForNodes(
        nodeIds: number[],
    ): Promise<Map<number, IContentStep[]>> {
        const grouped = new Map<number, IContentStep[]>(
            nodeIds.map((nodeId): [number, IContentStep[]] => [nodeId, []]),
        );
        if (nodeIds.length === 0) {
            return grouped;
        }

        const result = await this.getPool().query<TContentStepRow>(
            `SELECT ${STEP_COLUMNS} FROM menu_steps
                WHERE node_id = ANY($1::int[])
                ORDER BY node_id, position`,
            [nodeIds],
        );

        for (const row of result.rows) {
            grouped.get(row.node_id)?.push(this.toStep(row));
        }

        return grouped;
    }

    public async getStep(
        nodeId: number,
        position: number,
    ): Promise<IContentStep | undefined> {
        const result = await this.getPool().query<TContentStepRow>(
            `SELECT ${STEP_COLUMNS} FROM menu_steps WHERE node_id = $1 AND position = $2`,
            [nodeId, position],
        );
        const row = result.rows[0];
        return row ? this.toStep(row) : undefined;
    }

    public async appendStep(
        nodeId: number,
        step: IContentStepInput,
    ): Promise<IContentStep | undefined> {
        return this.insertStep(nodeId, Number.MAX_SAFE_INTEGER, step);
    }

    /**
     * Shifts every step at or after the target position and writes the new row
     * in one transaction. The node row is locked for the duration so concurrent
     * edits of the same node queue up instead of interleaving.
     */
    public async insertStep(
        nodeId: number,
        position: number,
        step: IContentStepInput,
    ): Promise<IContentStep | undefined> {
        return this.withTransaction(async (client) => {
            if (!(await this.lockNode(client, nodeId))) {
                return undefined;
            }

            const count = await this.countSteps(client, nodeId);
            const target = clampInsertPosition(position, count);

            await client.query(
                'UPDATE menu_steps SET position = position + 1 WHERE node_id = $1 AND position >= $2',
                [nodeId, target],
            );

            return this.insertStepRow(client, nodeId, target, step);
        });
    }

    public async updateStepContent(
        nodeId: number,
        position: number,
        patch: IContentStepPatch,
    ): Promise<boolean> {
        return this.execute(
            `UPDATE menu_steps
                SET content_type = $3, content_text = $4, file_id = $5, file_type = $6
                WHERE node_id = $1 AND position = $2`,
            [
                nodeId,
                position,
                stepKindOf(patch.media),
                patch.text,
                patch.media?.fileId ?? null,
                patch.media?.kind ?? null,
            ],
        );
    }

    public async updateStepDelay(
        nodeId: number,
        position: number,
        delay: number,
    ): Promise<boolean> {
        return this.execute(
            'UPDATE menu_steps SET delay = $3 WHERE node_id = $1 AND position = $2',
            [nodeId, position, delay],
        );
    }

    public async deleteStep(nodeId: number, position: number): Promise<boolean> {
        return this.withTransaction(async (client) => {
            if (!(await this.lockNode(client, nodeId))) {
                return false;
            }

            const removed = await client.query(
                'DELETE FROM menu_steps WHERE node_id = $1 AND position = $2',
                [nodeId, position],
            );
            if (!removed.rowCount) {
                return false;
            }

            await client.query(
                'UPDATE menu_steps SET position = position - 1 WHERE node_id = $1 AND position > $2',
                [nodeId, position],
            );
            return true;
        });
    }

    public async moveStep(
        nodeId: number,
        from: number,
        to: number,
    ): Promise<boolean> {
        return this.withTransaction(async (client) => {
            if (!(await this.lockNode(client, nodeId))) {
                return false;
            }

            const count = await this.countSteps(client, nodeId);
            if (!isExistingPosition(from, count) || !isExistingPosition(to, count)) {
                return false;
            }

            if (from === to) {
                return true;
            }

            const moving = await client.query<{ id: number }>(
                'SELECT id FROM menu_steps WHERE node_id = $1 AND position = $2',
                [nodeId, from],
            );
            const stepId = moving.rows[0]?.id;
            if (stepId === undefined) {
                return false;
            }

            if (from < to) {
                await client.query(
                    'UPDATE menu_steps SET position = position - 1 WHERE node_id = $1 AND position > $2 AND position <= $3',
                    [nodeId, from, to],
                );
            } else {
                await client.query(
                    'UPDATE menu_steps SET position = position + 1 WHERE node_id = $1 AND position >= $2 AND position < $3',
                    [nodeId, to, from],
                );
            }

            await client.query('UPDATE menu_steps SET position = $2 WHERE id = $1', [
                stepId,
                to,
            ]);
            return true;
        });
    }

    public async getWelcomeMessage(): Promise<string> {
        const result = await this.getPool().query<{ text: string }>(
            'SELECT text FROM welcome_message WHERE id = 1',
        );
        return result.rows[0]?.text ?? this.welcomeMessage;
    }

    public async setWelcomeMessage(text: string): Promise<void> {
        await this.getPool().query(
            `INSERT INTO welcome_message (id, text) VALUES (1, $1)
                ON CONFLICT (id) DO UPDATE SET text = EXCLUDED.text, updated_at = now()`,
            [text],
        );
    }

    private async withTransaction<T>(
        work: (client: PoolClient) => Promise<T>,
    ): Promise<T> {
        const client = await this.getPool().connect();
        try {
            await client.query('BEGIN');
            const result = await work(client);
            await client.query('COMMIT');
            return result;
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                this.logger.error(
                    `Rollback failed: ${rollbackError instanceof Error ? rollbackError.message : String(rollbackError)}`,
                );
            }
            throw error;
        } finally {
            client.release();
        }
    }

    private async insertNode(
        client: PoolClient,
        input: IMenuNodeInput,
    ): Promise<IMenuNode> {
        if (input.parentId !== null && !(await this.lockNode(client, input.parentId))) {
            throw new MenuNodeNotFoundError(input.parentId);
        }

        const inserted = await client.query<{ id: number }>(
            `INSERT INTO menu_nodes (label, parent_id, body, file_id, file_type)
                VALUES ($1, $2, $3, $4, $5)
                RETURNING id`,
            [
                input.label,
                input.parentId,
                input.body ?? null,
                input.media?.fileId ?? null,
                input.media?.kind ?? null,
            ],
        );
        const id = inserted.rows[0]?.id;
        if (id === undefined) {
            throw new Error('Menu node insert returned no id');
        }

        const updated = await client.query<TMenuNodeRow>(
            `UPDATE menu_nodes SET callback_token = $2 WHERE id = $1 RETURNING ${NODE_COLUMNS}`,
            [id, buildNodeToken(id)],
        );
        const row = updated.rows[0];
        if (!row) {
            throw new MenuNodeNotFoundError(id);
        }

        return this.toNode(row);
    }

    private async insertStepRow(
        client: PoolClient,
        nodeId: number,
        position: number,
        step: IContentStepInput,
    ): Promise<IContentStep> {
        const result = await client.query<TContentStepRow>(
            `INSERT INTO menu_steps
                (node_id, position, content_type, content_text, file_id, file_type, delay)
                VALUES ($1, $2, $3, $4, $5, $6, $7)
                RETURNING ${STEP_COLUMNS}`,
            [
                nodeId,
                position,
                stepKindOf(step.media),
                step.text,
                step.media?.fileId ?? null,
                step.media?.kind ?? null,
                step.delay,
            ],
        );
        const row = result.rows[0];
        if (!row) {
            throw new Error(`Step insert for menu node ${nodeId} returned no row`);
        }

        return this.toStep(row);
    }

    private async lockNode(client: PoolClient, nodeId: number): Promise<boolean> {
        const result = await client.query(
            'SELECT id FROM menu_nodes WHERE id = $1 FOR UPDATE',
            [nodeId],
        );
        return Boolean(result.rowCount);
    }

    private async countSteps(client: PoolClient, nodeId: number): Promise<number> {
        const result = await client.query<TCountRow>(
            'SELECT COUNT(*)::int AS count FROM menu_steps WHERE node_id = $1',
            [nodeId],
        );
        return result.rows[0]?.count ?? 0;
    }

    private async execute(text: string, values: unknown[]): Promise<boolean> {
        const result = await this.getPool().query(text, values);
        return Boolean(result.rowCount);
    }

    private getPool(): TPostgresPool {
        if (!this.pool) {
            throw new StorageNotReadyError('postgres');
        }
        return this.pool;
    }

    private toNode(row: TMenuNodeRow): IMenuNode {
        return {
            id: row.id,
            label: row.label,
            callbackToken: row.callback_token ?? buildNodeToken(row.id),
            body: row.body,
            parentId: row.parent_id,
            media: toMediaRef(row.file_id, row.file_type),
            delay: row.delay ?? 0,
            createdAt: row.created_at,
        };
    }

    private toStep(row: TContentStepRow): IContentStep {
        const media = toMediaRef(row.file_id, row.file_type);
        return {
            id: row.id,
            nodeId: row.node_id,
            position: row.position,
            kind: stepKindOf(media),
            text: row.content_text,
            media,
            delay: row.delay ?? 0,
            createdAt: row.created_at,
        };
    }
}
