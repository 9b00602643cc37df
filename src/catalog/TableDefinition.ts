export type ColumnType = 'string';

export interface IColumnDefinition {
  name: string;
  type: ColumnType;
}

export interface ITableDefinition {
  name: string;
  columns: readonly IColumnDefinition[];
  location: string;
  inputFormat: string;
  outputFormat: string;
}

export const TEXT_INPUT_FORMAT = 'org.apache.hadoop.mapred.TextInputFormat';
export const HIVE_TEXT_OUTPUT_FORMAT = 'org.apache.hadoop.hive.ql.io.HiveIgnoreKeyTextOutputFormat';

// Nested values in `stats` land in the catalog as their JSON string form.
export const SPORTS_DATA_COLUMNS: readonly IColumnDefinition[] = Object.freeze([
  { name: 'id', type: 'string' },
  { name: 'name', type: 'string' },
  { name: 'stats', type: 'string' },
]);

/**
 * The table covers every object under `location`.
 */
export function sportsDataTable(name: string, location: string): ITableDefinition {
  return {
    name,
    columns: SPORTS_DATA_COLUMNS,
    location,
    inputFormat: TEXT_INPUT_FORMAT,
    outputFormat: HIVE_TEXT_OUTPUT_FORMAT,
  };
}
