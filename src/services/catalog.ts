/**
 * Table catalog backed by knex-schema-inspector.
 */

import type {
  ColumnDescription,
  TableDescription,
  TableSummary,
} from '../types/models.js';
import type { SchemaInspectorLike } from './schema-context.js';

function toDefaultValue(value: unknown): string | number | boolean | null {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

export class TableCatalog {
  constructor(private readonly inspector: SchemaInspectorLike) {}

  /**
   * List all tables with their column counts, sorted by name.
   */
  async listTables(): Promise<TableSummary[]> {
    const tables = [...(await this.inspector.tables())].sort();
    return Promise.all(
      tables.map(async (table) => ({
        table_name: table,
        column_count: (await this.inspector.columnInfo(table)).length,
      }))
    );
  }

  /**
   * Describe one table, or null when it does not exist.
   */
  async describeTable(tableName: string): Promise<TableDescription | null> {
    const tables = await this.inspector.tables();
    if (!tables.includes(tableName)) {
      return null;
    }

    const [columns, foreignKeys] = await Promise.all([
      this.inspector.columnInfo(tableName),
      this.inspector.foreignKeys(tableName),
    ]);

    return {
      table_name: tableName,
      columns: columns.map(
        (col): ColumnDescription => ({
          column_name: col.name,
          data_type: col.data_type,
          is_nullable: col.is_nullable,
          default_value: toDefaultValue(col.default_value),
          max_length: col.max_length,
        })
      ),
      primary_keys: columns.filter((col) => col.is_primary_key).map((col) => col.name),
      foreign_keys: foreignKeys.map((fk) => ({
        column_name: fk.column,
        foreign_table_name: fk.foreign_key_table,
        foreign_column_name: fk.foreign_key_column,
      })),
    };
  }
}
