import Database from 'better-sqlite3';
import { Kysely, OperationNodeTransformer, PrimitiveValueListNode, SqliteDialect, ValueNode } from 'kysely';
import type {
  KyselyPlugin,
  PluginTransformQueryArgs,
  PluginTransformResultArgs,
  QueryResult,
  RootOperationNode,
  UnknownRow,
} from 'kysely';
import type { DB } from '../../src/shared/db/schema';
import type { Db } from '../../src/shared/db/db';
import { migrateToLatest } from '../../src/shared/db/migrate';

/**
 * WHY:
 * - E2E tests run the real app against an in-memory SQLite database instead of
 *   Postgres, so the suite needs no running infrastructure.
 *
 * HOW:
 * - SQLite binds neither booleans nor Dates. Parameters are converted on the
 *   way in (true → 1, Date → ISO string) and the typed columns converted back on
 *   the way out, so the Postgres-shaped schema types still hold.
 *
 * RULES:
 * - Test-only. Production always runs on Postgres (shared/db/db.ts).
 */

const BOOLEAN_COLUMNS = new Set(['is_active', 'is_verified', 'is_published', 'is_approved']);
const DATE_COLUMNS = new Set(['date_added', 'date_updated', 'deleted_at', 'published_at']);

function toSqliteValue(value: unknown): unknown {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return value;
}

class SqliteParamTransformer extends OperationNodeTransformer {
  protected override transformValue(node: ValueNode): ValueNode {
    const value = toSqliteValue(node.value);
    return node.immediate ? ValueNode.createImmediate(value) : ValueNode.create(value);
  }

  protected override transformPrimitiveValueList(
    node: PrimitiveValueListNode,
  ): PrimitiveValueListNode {
    return PrimitiveValueListNode.create(node.values.map(toSqliteValue));
  }
}

function fromSqliteRow(row: UnknownRow): UnknownRow {
  const out: UnknownRow = {};
  for (const [key, value] of Object.entries(row)) {
    if (BOOLEAN_COLUMNS.has(key) && typeof value === 'number') {
      out[key] = value === 1;
    } else if (DATE_COLUMNS.has(key) && typeof value === 'string') {
      out[key] = new Date(value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

export class SqliteTestPlugin implements KyselyPlugin {
  private readonly transformer = new SqliteParamTransformer();

  transformQuery(args: PluginTransformQueryArgs): RootOperationNode {
    return this.transformer.transformNode(args.node);
  }

  transformResult(args: PluginTransformResultArgs): Promise<QueryResult<UnknownRow>> {
    return Promise.resolve({
      ...args.result,
      rows: args.result.rows.map(fromSqliteRow),
    });
  }
}

export async function createTestDb(): Promise<Db> {
  const db = new Kysely<DB>({
    dialect: new SqliteDialect({ database: new Database(':memory:') }),
    plugins: [new SqliteTestPlugin()],
  });

  await migrateToLatest(db);
  return db;
}
