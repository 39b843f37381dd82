import Database from 'better-sqlite3';
import type { AttributeValue, StoredItem } from '../types/index.js';
import { InputError, PaperdexError, StoreError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { IndexDefinition, TableDefinition } from './schema.js';

/** Most items a single batch write may carry. */
export const MAX_BATCH_ITEMS = 25;

export const DEFAULT_PAGE_SIZE = 100;

/** Holds table status; not available as an item table name. */
export const CATALOG_TABLE = 'paperdex_catalog';
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type TableStatus = 'CREATING' | 'ACTIVE';

export interface TableDescription {
    name: string;
    status: TableStatus;
    indexes: Array<{ name: string; status: 'ACTIVE' | 'MISSING' }>;
}

/** Primary key (plus index key, for index queries) of the last item on a page. */
export type ItemKey = Record<string, string>;

export interface QueryInput {
    /** Query a secondary index instead of the table itself */
    indexName?: string;
    /** Value of the (index) partition attribute */
    partitionValue: string;
    /** Inclusive bounds on the (index) sort attribute */
    sortKeyBetween?: { low: string; high: string };
    /** Ascending by sort key when true (default), descending when false */
    scanForward?: boolean;
    /** Maximum items on this page */
    limit?: number;
    /** Resume after this key (the previous page's `lastEvaluatedKey`) */
    exclusiveStartKey?: ItemKey;
}

export interface QueryPage {
    items: StoredItem[];
    /** Present only when more matching items exist after this page */
    lastEvaluatedKey?: ItemKey;
}

/** Read side of the store, as the query executors see it. */
export interface ItemReader {
    query(input: QueryInput): QueryPage;
}

/** Write side of the store, as the batch writer sees it. */
export interface ItemWriter {
    batchWrite(items: readonly StoredItem[]): void;
}

/** Table administration, as the provisioner sees it. */
export interface TableAdmin {
    readonly definition: TableDefinition;
    describeTable(): TableDescription | null;
    createTable(): void;
}

export interface ItemStoreOptions {
    /** Cap on items per query page */
    pageSize?: number;
    /** How long a write waits on a locked database before failing */
    busyTimeoutMs?: number;
}

interface CatalogRow {
    status: TableStatus;
}

interface DataRow {
    data: string;
}

/**
 * Partitioned item store on top of better-sqlite3.
 *
 * One SQLite table holds every item. Each key attribute (table and index keys)
 * gets its own column; the full item is kept as JSON. Secondary indexes are
 * partial SQLite indexes over their key columns, so only items carrying the
 * index partition attribute appear in them.
 */
export class ItemStore implements ItemReader, ItemWriter, TableAdmin {
    private db: Database.Database;
    private readonly logger = getLogger();
    readonly definition: TableDefinition;
    private readonly pageSize: number;
    private readonly keyAttributes: string[];

    constructor(dbPath: string, definition: TableDefinition, options: ItemStoreOptions = {}) {
        assertTableName(definition.name);
        this.definition = definition;
        this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
        this.keyAttributes = collectKeyAttributes(definition);

        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
        this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${CATALOG_TABLE} (
        table_name TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

        this.logger.debug({ dbPath, table: definition.name }, 'Item store opened');
    }

    get tableName(): string {
        return this.definition.name;
    }

    // ─── Administration ───────────────────────────────────────

    describeTable(): TableDescription | null {
        return this.guard('describeTable', this.tableName, () => {
            const row = this.db
                .prepare<[string], CatalogRow>(`SELECT status FROM ${CATALOG_TABLE} WHERE table_name = ?`)
                .get(this.tableName);
            if (!row) return null;

            const existing = new Set(
                this.db
                    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ?")
                    .all(this.tableName)
                    .map((r) => r.name)
            );

            return {
                name: this.tableName,
                status: row.status,
                indexes: this.definition.indexes.map((index) => ({
                    name: index.name,
                    status: existing.has(this.indexSqlName(index)) ? 'ACTIVE' : 'MISSING',
                })),
            };
        });
    }

    /**
     * Create the table and its secondary indexes.
     * Throws a StoreError with `alreadyExists` set when the table is present.
     */
    createTable(): void {
        this.guard('createTable', this.tableName, () => {
            const table = this.tableName;
            const keyColumns = this.keyAttributes.map((attr) => {
                const notNull = attr === this.definition.partitionKey || attr === this.definition.sortKey;
                return `${column(attr)} TEXT${notNull ? ' NOT NULL' : ''}`;
            });

            const create = this.db.transaction(() => {
                this.db.prepare(`INSERT INTO ${CATALOG_TABLE} (table_name, status) VALUES (?, 'CREATING')`).run(table);
                this.db.exec(`
          CREATE TABLE ${table} (
            ${keyColumns.join(',\n            ')},
            item_type TEXT,
            data TEXT NOT NULL,
            PRIMARY KEY (${column(this.definition.partitionKey)}, ${column(this.definition.sortKey)})
          )
        `);
                for (const index of this.definition.indexes) {
                    const pk = column(index.partitionKey);
                    const sk = column(index.sortKey);
                    this.db.exec(
                        `CREATE INDEX ${this.indexSqlName(index)} ON ${table} (${pk}, ${sk}, ${column(this.definition.partitionKey)}, ${column(this.definition.sortKey)}) WHERE ${pk} IS NOT NULL`
                    );
                }
                this.db.prepare(`UPDATE ${CATALOG_TABLE} SET status = 'ACTIVE' WHERE table_name = ?`).run(table);
            });

            create();
            this.logger.debug({ table, indexes: this.definition.indexes.map((i) => i.name) }, 'Table created');
        });
    }

    // ─── Writes ───────────────────────────────────────────────

    /**
     * Upsert up to MAX_BATCH_ITEMS items in one transaction.
     * An item replaces any stored item with the same primary key; duplicate
     * primary keys inside the batch collapse to the last occurrence.
     * The batch commits entirely or not at all.
     */
    batchWrite(items: readonly StoredItem[]): void {
        if (items.length > MAX_BATCH_ITEMS) {
            throw new InputError(`A batch holds at most ${MAX_BATCH_ITEMS} items, got ${items.length}`);
        }
        if (items.length === 0) return;

        const rows = new Map<string, Record<string, string | null>>();
        for (const item of items) {
            const { key, params } = this.toRow(item);
            rows.delete(key);
            rows.set(key, params);
        }

        this.guard('batchWrite', this.tableName, () => {
            const columns = [...this.keyAttributes.map(column), 'item_type', 'data'];
            const stmt = this.db.prepare<Record<string, string | null>>(`
        INSERT OR REPLACE INTO ${this.tableName} (${columns.join(', ')})
        VALUES (${columns.map((c) => `@${c}`).join(', ')})
      `);

            const writeAll = this.db.transaction((batch: Array<Record<string, string | null>>) => {
                for (const params of batch) {
                    stmt.run(params);
                }
            });

            writeAll([...rows.values()]);
        });
    }

    // ─── Reads ────────────────────────────────────────────────

    /**
     * Read one page of a partition, ordered by the sort key.
     *
     * Table queries order by SK. Index queries order by the index sort key
     * and break ties on the table's primary key, which also makes the
     * continuation key unique.
     */
    query(input: QueryInput): QueryPage {
        const index = input.indexName !== undefined ? this.findIndex(input.indexName) : undefined;
        const limit = input.limit ?? this.pageSize;
        if (!Number.isInteger(limit) || limit < 1) {
            throw new InputError(`limit must be a positive integer, got ${limit}`);
        }
        const pageCap = Math.min(limit, this.pageSize);

        const { partitionKey, sortKey } = this.definition;
        const orderAttributes = index ? [index.sortKey, partitionKey, sortKey] : [sortKey];
        const direction = input.scanForward === false ? 'DESC' : 'ASC';

        const where = [`${column(index?.partitionKey ?? partitionKey)} = @partition`];
        const params: Record<string, string | number> = { partition: input.partitionValue };

        if (input.sortKeyBetween) {
            where.push(`${column(index?.sortKey ?? sortKey)} BETWEEN @low AND @high`);
            params['low'] = input.sortKeyBetween.low;
            params['high'] = input.sortKeyBetween.high;
        }

        if (input.exclusiveStartKey) {
            const cursor = orderAttributes.map((attr, i) => {
                const value = input.exclusiveStartKey?.[attr];
                if (value === undefined) {
                    throw new InputError(`exclusiveStartKey is missing ${attr}`);
                }
                params[`c${i}`] = value;
                return `@c${i}`;
            });
            const comparator = direction === 'ASC' ? '>' : '<';
            where.push(`(${orderAttributes.map(column).join(', ')}) ${comparator} (${cursor.join(', ')})`);
        }

        params['take'] = pageCap + 1;

        return this.guard('query', input.partitionValue, () => {
            const rows = this.db
                .prepare<Record<string, string | number>, DataRow>(`
          SELECT data FROM ${this.tableName}
          WHERE ${where.join(' AND ')}
          ORDER BY ${orderAttributes.map((attr) => `${column(attr)} ${direction}`).join(', ')}
          LIMIT @take
        `)
                .all(params);

            const page = rows.slice(0, pageCap).map((row) => parseItem(row.data, this.tableName));
            const last = page[page.length - 1];

            const result: QueryPage = {
                items: page.map((item) => project(item, this.definition, index)),
            };
            if (rows.length > pageCap && last) {
                result.lastEvaluatedKey = this.keyOf(last, index);
            }
            return result;
        });
    }

    // ─── Stats ────────────────────────────────────────────────

    countItems(): number {
        return this.guard('countItems', this.tableName, () => {
            const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${this.tableName}`).get();
            return row?.count ?? 0;
        });
    }

    countByType(): Record<string, number> {
        return this.guard('countByType', this.tableName, () => {
            const rows = this.db
                .prepare<[], { item_type: string | null; count: number }>(
                    `SELECT item_type, COUNT(*) as count FROM ${this.tableName} GROUP BY item_type ORDER BY item_type`
                )
                .all();
            const counts: Record<string, number> = {};
            for (const row of rows) {
                counts[row.item_type ?? 'UNTYPED'] = row.count;
            }
            return counts;
        });
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        this.logger.debug({ table: this.tableName }, 'Item store closed');
    }

    private findIndex(name: string): IndexDefinition {
        const index = this.definition.indexes.find((i) => i.name === name);
        if (!index) {
            throw new InputError(`Table ${this.tableName} has no index named ${name}`);
        }
        return index;
    }

    private indexSqlName(index: IndexDefinition): string {
        return `${this.tableName}_${index.name}`;
    }

    private keyOf(item: StoredItem, index: IndexDefinition | undefined): ItemKey {
        const attributes = [this.definition.partitionKey, this.definition.sortKey];
        if (index) attributes.push(index.partitionKey, index.sortKey);

        const key: ItemKey = {};
        for (const attr of attributes) {
            const value = item[attr];
            if (typeof value === 'string') key[attr] = value;
        }
        return key;
    }

    /**
     * Map an item onto table columns. `key` identifies its primary key
     * for in-batch de-duplication.
     */
    private toRow(item: StoredItem): { key: string; params: Record<string, string | null> } {
        const params: Record<string, string | null> = {};
        for (const attr of this.keyAttributes) {
            const value = item[attr];
            const required = attr === this.definition.partitionKey || attr === this.definition.sortKey;
            if (value === undefined || value === null) {
                if (required) throw new InputError(`Item is missing key attribute ${attr}`);
                params[column(attr)] = null;
            } else if (typeof value !== 'string') {
                throw new InputError(`Key attribute ${attr} must be a string`);
            } else {
                params[column(attr)] = value;
            }
        }

        const itemType = item['item_type'];
        params['item_type'] = typeof itemType === 'string' ? itemType : null;
        params['data'] = JSON.stringify(item);

        const key = JSON.stringify([item[this.definition.partitionKey], item[this.definition.sortKey]]);
        return { key, params };
    }

    /**
     * Run a store operation, converting driver failures into StoreError.
     */
    private guard<T>(operation: string, key: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            if (error instanceof PaperdexError) throw error;
            throw toStoreError(error, operation, key);
        }
    }
}

/**
 * Classify a driver error. Busy/locked databases are transient; a CREATE on
 * an existing table or catalog entry means the table already exists.
 */
export function toStoreError(error: unknown, operation: string, key: string): StoreError {
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof Database.SqliteError ? error.code : '';

    return new StoreError(message, {
        operation,
        key,
        cause: error,
        retryable: code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'),
        alreadyExists: /already exists/i.test(message) || code === 'SQLITE_CONSTRAINT_PRIMARYKEY',
    });
}

/**
 * Keep the attributes an index exposes: table keys, index keys, and the
 * included list (or everything, for ALL).
 */
function project(item: StoredItem, table: TableDefinition, index: IndexDefinition | undefined): StoredItem {
    if (!index || index.projection.type === 'ALL') return item;

    const keep = [table.partitionKey, table.sortKey, index.partitionKey, index.sortKey, ...index.projection.attributes];
    const projected: StoredItem = {};
    for (const attr of keep) {
        const value = item[attr];
        if (value !== undefined) projected[attr] = value;
    }
    return projected;
}

function parseItem(raw: string, table: string): StoredItem {
    const parsed: unknown = JSON.parse(raw);
    if (!isStoredItem(parsed)) {
        throw new StoreError('stored item is not an attribute map', { operation: 'query', key: table });
    }
    return parsed;
}

function isStoredItem(value: unknown): value is StoredItem {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.values(value).every(isAttributeValue);
}

function isAttributeValue(value: unknown): value is AttributeValue {
    if (value === null) return true;
    switch (typeof value) {
        case 'string':
        case 'number':
        case 'boolean':
            return true;
        case 'object':
            return Array.isArray(value) ? value.every(isAttributeValue) : isStoredItem(value);
        default:
            return false;
    }
}

function collectKeyAttributes(definition: TableDefinition): string[] {
    const attributes = [definition.partitionKey, definition.sortKey];
    for (const index of definition.indexes) {
        assertIdentifier(index.name, 'index name');
        for (const attr of [index.partitionKey, index.sortKey]) {
            if (!attributes.includes(attr)) attributes.push(attr);
        }
    }
    for (const attr of attributes) assertIdentifier(attr, 'key attribute');
    return attributes;
}

function column(attribute: string): string {
    return attribute.toLowerCase();
}

function assertIdentifier(value: string, what: string): void {
    if (!IDENTIFIER.test(value) || value.toLowerCase() === 'data' || value.toLowerCase() === 'item_type') {
        throw new InputError(`Invalid ${what} "${value}"`);
    }
}

function assertTableName(value: string): void {
    assertIdentifier(value, 'table name');
    if (value.toLowerCase() === CATALOG_TABLE) {
        throw new InputError(`Table name "${value}" is reserved`);
    }
}
