import { MenuNodeNotFoundError, StorageNotReadyError } from '../../src/errors';
import { MENU_SCHEMA_STATEMENTS } from '../../src/storage/postgres.schema';
import { PostgresStorage } from '../../src/storage/postgres.storage';
import { createLoggerMock, textStep } from '../factories/menu';
import { FakePgPool, TQueryResponder } from '../mocks/pg-pool';

const CONNECTION = {
    host: 'localhost',
    port: 5432,
    database: 'menu',
    user: 'menu',
    password: 'test-secret',
};

const stepRow = (position: number) => ({
    id: 9,
    node_id: 5,
    position,
    content_text: 'hi',
    file_id: null,
    file_type: null,
    delay: 0,
    created_at: new Date(0),
});

const LOCK = 'SELECT id FROM menu_nodes WHERE id = $1 FOR UPDATE';
const COUNT = 'SELECT COUNT(*)::int AS count FROM menu_steps WHERE node_id = $1';

describe('PostgresStorage', () => {
    const createStorage = async (responder?: TQueryResponder) => {
        const pool = new FakePgPool(responder);
        const logger = createLoggerMock();
        const poolFactory = jest.fn(() => pool.asPool());
        const storage = new PostgresStorage(CONNECTION, {
            poolFactory,
            logger,
            welcomeMessage: 'Hi',
        });
        await storage.init();
        pool.queries.length = 0;
        return { pool, storage, logger, poolFactory };
    };

    it('applies the schema and seeds the welcome row on init', async () => {
        const pool = new FakePgPool();
        const logger = createLoggerMock();
        const poolFactory = jest.fn(() => pool.asPool());
        const storage = new PostgresStorage(CONNECTION, { poolFactory, logger });

        await storage.init();
        await storage.init();

        expect(poolFactory).toHaveBeenCalledTimes(1);
        expect(poolFactory).toHaveBeenCalledWith(
            expect.objectContaining({ host: 'localhost', min: 1, max: 10 }),
        );
        expect(pool.queries).toHaveLength(MENU_SCHEMA_STATEMENTS.length + 1);
        expect(pool.queries.at(-1)?.values).toEqual([
            'Welcome! Pick a section below or use search to find what you need.',
        ]);
        expect(logger.log).toHaveBeenCalledWith('Connected to localhost:5432/menu');
    });

    it('ends the pool when the schema cannot be applied', async () => {
        const pool = new FakePgPool(() => new Error('permission denied'));
        const storage = new PostgresStorage(CONNECTION, {
            poolFactory: () => pool.asPool(),
            logger: createLoggerMock(),
        });

        await expect(storage.init()).rejects.toThrow('permission denied');
        expect(pool.end).toHaveBeenCalledTimes(1);
        await expect(storage.listNodes()).rejects.toBeInstanceOf(
            StorageNotReadyError,
        );
    });

    it('fails fast before init', async () => {
        const storage = new PostgresStorage(CONNECTION, {
            poolFactory: () => new FakePgPool().asPool(),
        });

        await expect(storage.getNode(1)).rejects.toBeInstanceOf(
            StorageNotReadyError,
        );
    });

    it('shifts and inserts a step inside one transaction holding the node lock', async () => {
        const { pool, storage } = await createStorage((query) => {
            if (query.text === LOCK) {
                return { rows: [{ id: 5 }], rowCount: 1 };
            }
            if (query.text === COUNT) {
                return { rows: [{ count: 3 }] };
            }
            if (query.text.startsWith('INSERT INTO menu_steps')) {
                return { rows: [stepRow(2)] };
            }
            return undefined;
        });

        const step = await storage.insertStep(5, 2, textStep('hi'));

        expect(step).toMatchObject({ nodeId: 5, position: 2, kind: 'text', text: 'hi' });
        expect(pool.texts()[0]).toBe('BEGIN');
        expect(pool.texts()[1]).toBe(LOCK);
        expect(pool.texts()[2]).toBe(COUNT);
        expect(pool.queries[3]).toEqual({
            text: 'UPDATE menu_steps SET position = position + 1 WHERE node_id = $1 AND position >= $2',
            values: [5, 2],
        });
        expect(pool.texts()[4]).toMatch(/^INSERT INTO menu_steps/);
        expect(pool.queries[4]?.values).toEqual([5, 2, 'text', 'hi', null, null, 0]);
        expect(pool.texts()[5]).toBe('COMMIT');
        expect(pool.release).toHaveBeenCalledTimes(1);
    });

    it('returns nothing when the node of a new step is gone', async () => {
        const { pool, storage } = await createStorage(() => undefined);

        await expect(storage.insertStep(5, 1, textStep('hi'))).resolves.toBeUndefined();
        expect(pool.texts()).toEqual(['BEGIN', LOCK, 'COMMIT']);
    });

    it('rolls back and rethrows when a statement fails', async () => {
        const { pool, storage } = await createStorage((query) => {
            if (query.text === LOCK) {
                return { rows: [{ id: 5 }], rowCount: 1 };
            }
            if (query.text === COUNT) {
                return new Error('connection reset');
            }
            return undefined;
        });

        await expect(storage.insertStep(5, 1, textStep('hi'))).rejects.toThrow(
            'connection reset',
        );
        expect(pool.texts()).toEqual(['BEGIN', LOCK, COUNT, 'ROLLBACK']);
        expect(pool.release).toHaveBeenCalledTimes(1);
    });

    it('closes the gap left by a deleted step', async () => {
        const { pool, storage } = await createStorage((query) => {
            if (query.text === LOCK) {
                return { rows: [{ id: 5 }], rowCount: 1 };
            }
            if (query.text.startsWith('DELETE FROM menu_steps')) {
                return { rowCount: 1 };
            }
            return undefined;
        });

        await expect(storage.deleteStep(5, 2)).resolves.toBe(true);
        expect(pool.queries.slice(2, 4)).toEqual([
            {
                text: 'DELETE FROM menu_steps WHERE node_id = $1 AND position = $2',
                values: [5, 2],
            },
            {
                text: 'UPDATE menu_steps SET position = position - 1 WHERE node_id = $1 AND position > $2',
                values: [5, 2],
            },
        ]);
        expect(pool.texts().at(-1)).toBe('COMMIT');
    });

    it('refuses to create a node under a missing parent', async () => {
        const { pool, storage } = await createStorage(() => undefined);

        await expect(
            storage.createNode({ label: 'Orphan', parentId: 7 }),
        ).rejects.toBeInstanceOf(MenuNodeNotFoundError);
        expect(pool.texts()).toEqual(['BEGIN', LOCK, 'ROLLBACK']);
    });

    it('maps node rows and falls back to a document for unknown file types', async () => {
        const { storage } = await createStorage(() => ({
            rows: [
                {
                    id: 3,
                    label: 'Office',
                    callback_token: null,
                    body: null,
                    parent_id: 2,
                    file_id: 'file-1',
                    file_type: 'sticker',
                    delay: null,
                    created_at: new Date(0),
                },
            ],
        }));

        await expect(storage.getNode(3)).resolves.toEqual({
            id: 3,
            label: 'Office',
            callbackToken: 'id:3',
            body: null,
            parentId: 2,
            media: { fileId: 'file-1', kind: 'document' },
            delay: 0,
            createdAt: new Date(0),
        });
    });

    it('reports whether an update touched a row', async () => {
        const { storage } = await createStorage((query) =>
            query.values[0] === 1 ? { rowCount: 1 } : { rowCount: 0 },
        );

        await expect(storage.updateNodeLabel(1, 'New')).resolves.toBe(true);
        await expect(storage.updateNodeLabel(2, 'New')).resolves.toBe(false);
    });
});
