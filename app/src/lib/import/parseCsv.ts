import type { CellValue, RawTable } from "./types";

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

type Delimiter = "," | ";";

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");

// Counted on the header line only, ignoring quoted text.
const detectDelimiter = (text: string): Delimiter => {
  let commas = 0;
  let semicolons = 0;
  let inQuotes = false;
  for (const char of text) {
    if (char === "\n" && !inQuotes) {
      break;
    }
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (!inQuotes && char === ",") {
      commas += 1;
    } else if (!inQuotes && char === ";") {
      semicolons += 1;
    }
  }
  return semicolons > commas ? ";" : ",";
};

/**
 * Splits the text into records of raw fields. Quoted fields may contain the
 * delimiter, doubled quotes and line breaks.
 */
const readRecords = (text: string, delimiter: Delimiter): string[][] => {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;

  const endField = () => {
    record.push(field);
    field = "";
  };
  const endRecord = () => {
    endField();
    if (record.some((value) => value.trim() !== "")) {
      records.push(record);
    }
    record = [];
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (inQuotes) {
      if (char === '"' && text[index + 1] === '"') {
        field += '"';
        index += 1;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      endField();
    } else if (char === "\n") {
      endRecord();
    } else {
      field += char;
    }
  }
  endRecord();

  return records;
};

// Formatted values ("$1,200") and leading-zero codes ("02134") stay text.
const toCell = (raw: string | undefined): CellValue => {
  const value = (raw ?? "").trim();
  if (!value) {
    return null;
  }
  if (numericPattern.test(value) && !/^-?0\d/.test(value)) {
    return Number(value);
  }
  return value;
};

/**
 * The first record is the header; `rowsToSkip` further records below it are
 * dropped before the data rows start.
 */
export const parseCsvText = (text: string, rowsToSkip = 0): RawTable => {
  const sanitized = sanitizeText(text);
  const [headerRecord, ...dataRecords] = readRecords(sanitized, detectDelimiter(sanitized));
  if (!headerRecord) {
    throw new Error("CSV appears to be empty.");
  }

  const headers = headerRecord.map((header) => header.trim());
  const rows = dataRecords
    .slice(Math.max(0, rowsToSkip))
    .map((record) => headers.map((_, index) => toCell(record[index])));

  return { headers, rows };
};
