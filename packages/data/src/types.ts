/** A single data row keyed by column name; `null` marks a cell the row did not supply. */
export type DatasetRow = Record<string, string | null>;

export interface Dataset {
	/** Header names in file order. */
	columns: string[];
	rows: DatasetRow[];
	/** Numeric `close` per row, `null` where the value is missing. */
	closes: (number | null)[];
}

export const CLOSE_COLUMN = "close";
