import fs from "node:fs";
import { parse } from "csv-parse/sync";
import {
	FormatError,
	NotFoundError,
	ValidationError,
	getErrorMessage,
} from "@rolling-signal/core";
import { CLOSE_COLUMN } from "./types";
import type { Dataset, DatasetRow } from "./types";

const MISSING_TOKENS = new Set(["", "NA", "N/A", "NaN", "nan", "null", "NULL"]);

const INVALID_FORMAT = "Invalid CSV file format";

const isStringRecord = (value: unknown): value is string[] =>
	Array.isArray(value) && value.every((cell) => typeof cell === "string");

const readRecords = (contents: string): string[][] => {
	let records: unknown;
	try {
		records = parse(contents, {
			bom: true,
			skip_empty_lines: true,
			relax_column_count: true,
		});
	} catch (error) {
		throw new FormatError(INVALID_FORMAT, getErrorMessage(error));
	}
	if (!Array.isArray(records) || !records.every(isStringRecord)) {
		throw new FormatError(INVALID_FORMAT, "unexpected parser output");
	}
	return records;
};

const toRow = (
	header: string[],
	record: string[],
	rowNumber: number
): DatasetRow => {
	if (record.length > header.length) {
		throw new FormatError(
			INVALID_FORMAT,
			`row ${rowNumber}: expected ${header.length} fields, saw ${record.length}`
		);
	}
	const row: DatasetRow = {};
	header.forEach((column, idx) => {
		row[column] = idx < record.length ? record[idx] : null;
	});
	return row;
};

export const parseCloseValue = (
	raw: string | null,
	rowNumber: number
): number | null => {
	if (raw === null) {
		return null;
	}
	const trimmed = raw.trim();
	if (MISSING_TOKENS.has(trimmed)) {
		return null;
	}
	const value = Number(trimmed);
	if (!Number.isFinite(value)) {
		throw new ValidationError(
			`Invalid numeric value in column ${CLOSE_COLUMN} at row ${rowNumber}: ${raw}`,
			CLOSE_COLUMN
		);
	}
	return value;
};

/**
 * Parses CSV text whose first line names the columns. Data rows align to the
 * header by position; a short row leaves its trailing cells `null`.
 */
export const parseDataset = (contents: string): Dataset => {
	const [header, ...records] = readRecords(contents);
	if (!header) {
		throw new FormatError(INVALID_FORMAT, "no header line");
	}
	const rows = records.map((record, idx) => toRow(header, record, idx + 1));

	if (!rows.length) {
		throw new ValidationError("Input file is empty");
	}
	if (!header.includes(CLOSE_COLUMN)) {
		throw new ValidationError(
			`Missing required column: ${CLOSE_COLUMN}`,
			CLOSE_COLUMN
		);
	}

	const closes = rows.map((row, idx) =>
		parseCloseValue(row[CLOSE_COLUMN], idx + 1)
	);
	return { columns: header, rows, closes };
};

export const loadDataset = (inputPath: string): Dataset => {
	if (!fs.existsSync(inputPath)) {
		throw new NotFoundError("Input CSV file not found", inputPath);
	}
	return parseDataset(fs.readFileSync(inputPath, "utf-8"));
};
