/**
 * Schema context providers.
 *
 * The schema context is the DDL text that grounds SQL generation. It is
 * loaded once at start-up and handed to the pipeline as an immutable value.
 */

import { readFile } from 'fs/promises';
import type { SchemaContext } from '../types/models.js';
import { SchemaLoadError } from '../types/errors.js';
import { errorMessage } from '../types/utils.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export interface SchemaContextProvider {
  load(): Promise<string>;
}

/**
 * Subset of knex-schema-inspector used to describe the database.
 */
export interface InspectorColumn {
  name: string;
  data_type: string;
  is_nullable: boolean;
  default_value: unknown;
  max_length: number | null;
  is_primary_key: boolean;
}

export interface InspectorForeignKey {
  table: string;
  column: string;
  foreign_key_table: string;
  foreign_key_column: string;
}

export interface SchemaInspectorLike {
  tables(): Promise<string[]>;
  columnInfo(table: string): Promise<InspectorColumn[]>;
  foreignKeys(table: string): Promise<InspectorForeignKey[]>;
}

export interface TableDefinition {
  name: string;
  columns: InspectorColumn[];
  foreignKeys: InspectorForeignKey[];
}

/**
 * Reads the DDL from a .sql file.
 */
export class FileSchemaContextProvider implements SchemaContextProvider {
  constructor(private readonly path: string) {}

  async load(): Promise<string> {
    return readFile(this.path, 'utf8');
  }
}

function renderColumnType(column: InspectorColumn): string {
  const type = column.data_type.toUpperCase();
  return column.max_length !== null && /CHAR/.test(type)
    ? `${type}(${column.max_length})`
    : type;
}

function renderDefault(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/**
 * Render CREATE TABLE statements for the given tables.
 */
export function renderDdl(tables: TableDefinition[], dialect: string): string {
  const lines: string[] = [`-- Database DDL (${dialect})`, ''];

  for (const table of tables) {
    const definitions: string[] = [];

    for (const column of table.columns) {
      let definition = `    ${column.name} ${renderColumnType(column)}`;
      if (!column.is_nullable) definition += ' NOT NULL';
      const defaultValue = renderDefault(column.default_value);
      if (defaultValue !== null) definition += ` DEFAULT ${defaultValue}`;
      definitions.push(definition);
    }

    const primaryKeys = table.columns.filter((c) => c.is_primary_key).map((c) => c.name);
    if (primaryKeys.length > 0) {
      definitions.push(`    PRIMARY KEY (${primaryKeys.join(', ')})`);
    }

    for (const fk of table.foreignKeys) {
      definitions.push(
        `    FOREIGN KEY (${fk.column}) REFERENCES ${fk.foreign_key_table}(${fk.foreign_key_column})`
      );
    }

    lines.push(`-- Table: ${table.name}`);
    lines.push(`CREATE TABLE ${table.name} (`);
    lines.push(definitions.join(',\n'));
    lines.push(');');
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Builds DDL from the live database through the schema inspector.
 */
export class DatabaseSchemaContextProvider implements SchemaContextProvider {
  constructor(
    private readonly inspector: SchemaInspectorLike,
    private readonly dialect: string,
    private readonly log: Logger = defaultLogger
  ) {}

  async load(): Promise<string> {
    const tableNames = [...(await this.inspector.tables())].sort();

    // Fetch all table schemas in parallel
    const tables = await Promise.all(
      tableNames.map(async (name): Promise<TableDefinition> => {
        const [columns, foreignKeys] = await Promise.all([
          this.inspector.columnInfo(name),
          this.inspector.foreignKeys(name),
        ]);
        return { name, columns, foreignKeys };
      })
    );

    this.log.info(`Extracted DDL for ${tables.length} tables`);
    return renderDdl(tables, this.dialect);
  }
}

/**
 * Load the schema context once.
 *
 * @throws SchemaLoadError when the provider fails or yields empty text
 */
export async function loadSchemaContext(
  provider: SchemaContextProvider,
  log: Logger = defaultLogger
): Promise<SchemaContext> {
  let text: string;
  try {
    text = await provider.load();
  } catch (error) {
    throw new SchemaLoadError(`Failed to load schema context: ${errorMessage(error)}`);
  }

  const context = text.trim();
  if (!context) {
    throw new SchemaLoadError('Schema context is empty');
  }

  log.info(`Schema context loaded (${context.length} characters)`);
  return context;
}
