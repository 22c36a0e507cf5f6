/**
 * Idempotent schema statements applied on every start. Columns that were added
 * after the first release are repeated as `ADD COLUMN IF NOT EXISTS` so that
 * older databases pick them up.
 */
export const MENU_SCHEMA_STATEMENTS: readonly string[] = [
    `CREATE TABLE IF NOT EXISTS menu_nodes (
        id SERIAL PRIMARY KEY,
        label TEXT NOT NULL,
        callback_token TEXT UNIQUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )`,
    `ALTER TABLE menu_nodes ADD COLUMN IF NOT EXISTS body TEXT`,
    `ALTER TABLE menu_nodes ADD COLUMN IF NOT EXISTS parent_id INTEGER
        REFERENCES menu_nodes(id) ON DELETE CASCADE`,
    `ALTER TABLE menu_nodes ADD COLUMN IF NOT EXISTS file_id TEXT`,
    `ALTER TABLE menu_nodes ADD COLUMN IF NOT EXISTS file_type TEXT`,
    `ALTER TABLE menu_nodes ADD COLUMN IF NOT EXISTS delay INTEGER NOT NULL DEFAULT 0`,
    `CREATE INDEX IF NOT EXISTS menu_nodes_parent_id_idx ON menu_nodes (parent_id)`,
    `CREATE TABLE IF NOT EXISTS menu_steps (
        id SERIAL PRIMARY KEY,
        node_id INTEGER NOT NULL REFERENCES menu_nodes(id) ON DELETE CASCADE,
        position INTEGER NOT NULL CHECK (position >= 1),
        content_type TEXT NOT NULL,
        content_text TEXT,
        file_id TEXT,
        file_type TEXT,
        delay INTEGER NOT NULL DEFAULT 0 CHECK (delay BETWEEN 0 AND 10),
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT menu_steps_node_position_key UNIQUE (node_id, position)
            DEFERRABLE INITIALLY DEFERRED
    )`,
    `CREATE TABLE IF NOT EXISTS welcome_message (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        text TEXT NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )`,
];

export const SEED_WELCOME_STATEMENT = `INSERT INTO welcome_message (id, text)
    VALUES (1, $1)
    ON CONFLICT (id) DO NOTHING`;
