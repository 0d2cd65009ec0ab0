/**
 * Tabular row types shared by the flattener and output renderers
 */

/** null, undefined and NaN render as missing */
export type CellValue = string | number | boolean | Date | null | undefined;

export type Row = Record<string, CellValue>;

/**
 * Rows plus the column order they render in
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}
