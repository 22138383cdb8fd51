#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { LEDGER_IMMUTABLE_SQLSTATE } from '../utils/sql-rows';
import { DEFAULT_TABLE_PREFIX, resolveTableNames } from '../utils/table-prefix';

export function generateMigration(prefix: string = DEFAULT_TABLE_PREFIX): string {
  const { definitions, instances, transitions } = resolveTableNames(prefix);
  const guardFunction = `${transitions}_append_only`;

  return `-- migrate:up
CREATE TABLE ${definitions} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    key TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    states JSONB NOT NULL,
    transitions JSONB NOT NULL,
    initial_state TEXT NOT NULL,
    terminal_states JSONB NOT NULL,
    guards JSONB NOT NULL DEFAULT '[]'::jsonb,
    active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE ${instances} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    definition_id UUID NOT NULL REFERENCES ${definitions}(id),
    subject_kind TEXT NOT NULL,
    subject_id TEXT NOT NULL,
    current_state TEXT NOT NULL,
    version INTEGER NOT NULL DEFAULT 0,
    created_by TEXT,
    started_at TIMESTAMPTZ NOT NULL,
    ended_at TIMESTAMPTZ,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${instances}_subject
    ON ${instances} (subject_kind, subject_id);

CREATE INDEX idx_${instances}_definition_state
    ON ${instances} (definition_id, current_state);

CREATE TABLE ${transitions} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    instance_id UUID NOT NULL REFERENCES ${instances}(id),
    sequence INTEGER NOT NULL,
    from_state TEXT NOT NULL,
    to_state TEXT NOT NULL,
    actor TEXT,
    effective_at TIMESTAMPTZ NOT NULL,
    recorded_at TIMESTAMPTZ NOT NULL,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    UNIQUE (instance_id, sequence)
);

CREATE INDEX idx_${transitions}_effective_at
    ON ${transitions} (instance_id, effective_at);

CREATE INDEX idx_${transitions}_recorded_at
    ON ${transitions} (instance_id, recorded_at);

CREATE FUNCTION ${guardFunction}() RETURNS trigger AS $$
BEGIN
    RAISE EXCEPTION '% on % rejected: transition records are append-only', TG_OP, TG_TABLE_NAME
        USING ERRCODE = '${LEDGER_IMMUTABLE_SQLSTATE}';
END;
$$ LANGUAGE plpgsql;

CREATE TRIGGER ${transitions}_no_update_delete
    BEFORE UPDATE OR DELETE ON ${transitions}
    FOR EACH ROW EXECUTE FUNCTION ${guardFunction}();

CREATE TRIGGER ${transitions}_no_truncate
    BEFORE TRUNCATE ON ${transitions}
    FOR EACH STATEMENT EXECUTE FUNCTION ${guardFunction}();

-- migrate:down
DROP TABLE IF EXISTS ${transitions};
DROP FUNCTION IF EXISTS ${guardFunction}();
DROP TABLE IF EXISTS ${instances};
DROP TABLE IF EXISTS ${definitions};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      'Usage: workflow-ledger generate-migration [prefix]\n\n' +
        'Generates a dbmate-compatible SQL migration with the definition, instance\n' +
        'and append-only transition tables.\n\n' +
        'Arguments:\n' +
        `  prefix    Table name prefix (alphanumeric and underscores, default "${DEFAULT_TABLE_PREFIX}")\n\n` +
        'Example:\n' +
        '  npx workflow-ledger generate-migration approvals',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const prefix = args[1] ?? DEFAULT_TABLE_PREFIX;
  const sql = generateMigration(prefix);

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${prefix}_ledger.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
