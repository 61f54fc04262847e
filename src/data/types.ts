export type ColumnKind = 'numeric' | 'text' | 'boolean' | 'temporal';

/** A single cell. `null` marks a missing value. */
export type CellValue = number | string | boolean | Date | null;

export interface DatasetColumn {
  readonly name: string;
  readonly kind: ColumnKind;
  readonly values: readonly CellValue[];
}

export interface TabularDataset {
  readonly columns: readonly DatasetColumn[];
  readonly rowCount: number;
}

export type DatasetRow = Record<string, CellValue>;

export interface ColumnSpec {
  name: string;
  values: readonly unknown[];
  kind?: ColumnKind;
}
