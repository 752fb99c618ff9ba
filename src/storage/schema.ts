/**
 * Embedded SQL schema for auto-initialization.
 * Kept as a string constant so it works reliably with npx / bundled installs.
 */

export const SCHEMA_SQL = `
-- Filesystem nodes (files + directories), one tree per namespace
CREATE TABLE IF NOT EXISTS pathkit_nodes (
    namespace TEXT NOT NULL,
    path TEXT NOT NULL,
    node_type TEXT NOT NULL CHECK (node_type IN ('file', 'directory')),
    content BYTEA,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (namespace, path)
);

-- Prefix index for listing and recursive removal (LIKE 'prefix%' queries)
CREATE INDEX IF NOT EXISTS idx_pathkit_nodes_path_prefix
    ON pathkit_nodes (namespace, path text_pattern_ops);
`;
