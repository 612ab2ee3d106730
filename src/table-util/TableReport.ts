import pico from "picocolors";
import type {
  Alignment,
  ColumnUserConfig,
  SpanningCellConfig,
  TableUserConfig,
} from "table";
import { table } from "table";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { bold } = isTest ? { bold: (str: string) => str } : pico;

/** Related table columns */
export interface ColumnGroup<T> {
  groupTitle?: string;
  columns: Column<T>[];
}

/** Column with optional formatter */
export interface Column<T> {
  key: keyof T;
  title: string;
  formatter?: (value: unknown) => string | null;
  alignment?: Alignment;
}

/** Table headers and configuration */
export interface TableSetup {
  headerRows: string[][];
  config: TableUserConfig;
}

/** Build formatted table from column groups, with a header row per group */
export function buildTable<T extends object>(
  columnGroups: ColumnGroup<T>[],
  records: T[],
): string {
  const dataRows = toRows(records, columnGroups);
  const { headerRows, config } = setup(columnGroups, dataRows);
  return table([...headerRows, ...dataRows], config);
}

/** Convert records to string arrays for table */
export function toRows<T extends object>(
  records: T[],
  groups: ColumnGroup<T>[],
): string[][] {
  const allColumns = groups.flatMap(group => group.columns);
  return records.map(record =>
    allColumns.map(col => {
      const value: unknown = record[col.key];
      const cell = col.formatter ? col.formatter(value) : value;
      return cell == null ? " " : String(cell);
    }),
  );
}

/** Create header rows with group titles */
function createGroupHeaders<T>(
  groups: ColumnGroup<T>[],
  numColumns: number,
): string[][] {
  if (!groups.some(g => g.groupTitle)) return [];

  const sectionRow = groups.flatMap(g => {
    const title = g.groupTitle ? [bold(g.groupTitle)] : [];
    return padWithBlanks(title, g.columns.length);
  });
  const blankRow = padWithBlanks([], numColumns);
  return [sectionRow, blankRow];
}

interface Lines {
  drawHorizontalLine: (index: number, size: number) => boolean;
  drawVerticalLine: (index: number, size: number) => boolean;
}

/** @return draw functions for horizontal/vertical table borders */
function createLines<T>(groups: ColumnGroup<T>[]): Lines {
  const { sectionBorders, headerBottom } = calcBorders(groups);

  function drawVerticalLine(index: number, size: number): boolean {
    return index === 0 || index === size || sectionBorders.includes(index);
  }
  function drawHorizontalLine(index: number, size: number): boolean {
    return index === 0 || index === size || index === headerBottom;
  }
  return { drawHorizontalLine, drawVerticalLine };
}

/** @return spanning cell configs for group title headers */
function createSectionSpans<T>(groups: ColumnGroup<T>[]): SpanningCellConfig[] {
  if (!groups.some(g => g.groupTitle)) return [];
  let col = 0;
  const alignment: Alignment = "center";
  return groups.map(g => {
    const colSpan = g.columns.length;
    const span = { row: 0, col, colSpan, alignment };
    col += colSpan;
    return span;
  });
}

/** @return bolded column title strings */
function getTitles<T>(groups: ColumnGroup<T>[]): string[] {
  return groups.flatMap(g => g.columns.map(c => bold(c.title || " ")));
}

/** @return array padded with blank strings to the given length */
function padWithBlanks(arr: string[], length: number): string[] {
  if (arr.length >= length) return arr;
  return [...arr, ...Array<string>(length - arr.length).fill(" ")];
}

/** Calculate vertical lines between sections and header bottom position */
function calcBorders<T>(groups: ColumnGroup<T>[]): {
  sectionBorders: number[];
  headerBottom: number;
} {
  const hasTitles = groups.some(g => g.groupTitle);
  const sectionBorders: number[] = [];
  let border = 0;
  for (const g of groups) {
    border += g.columns.length;
    sectionBorders.push(border);
  }
  return { sectionBorders, headerBottom: hasTitles ? 3 : 1 };
}

/** Create headers and table configuration */
function setup<T>(groups: ColumnGroup<T>[], dataRows: string[][]): TableSetup {
  const titles = getTitles(groups);
  const sectionRows = createGroupHeaders(groups, titles.length);
  const headerRows = [...sectionRows, titles];
  const config: TableUserConfig = {
    spanningCells: createSectionSpans(groups),
    columns: columnConfigs(groups, titles, dataRows),
    ...createLines(groups),
  };
  return { headerRows, config };
}

/** Column widths from content (including group titles) and alignments */
function columnConfigs<T>(
  groups: ColumnGroup<T>[],
  titles: string[],
  dataRows: string[][],
): Record<number, ColumnUserConfig> {
  const widths = titles.map((title, i) => {
    const dataWidths = dataRows.map(row => cellWidth(row[i]));
    return Math.max(cellWidth(title), ...dataWidths);
  });

  // widen the last column of a group so its title fits
  let colIndex = 0;
  for (const group of groups) {
    const groupW = cellWidth(group.groupTitle);
    const numCols = group.columns.length;
    if (groupW > 0) {
      const separatorWidth = (numCols - 1) * 3; // " | " between columns
      const currentWidth = widths
        .slice(colIndex, colIndex + numCols)
        .reduce((a, b) => a + b, 0);
      const needed = groupW - currentWidth - separatorWidth;
      if (needed > 0) widths[colIndex + numCols - 1] += needed;
    }
    colIndex += numCols;
  }

  const alignments = groups.flatMap(g => g.columns.map(c => c.alignment));
  return Object.fromEntries(
    widths.map((width, i) => {
      const alignment = alignments[i];
      const config = { width, wrapWord: false };
      return [i, alignment ? { ...config, alignment } : config];
    }),
  );
}

// ANSI escape codes (ESC [ ... m sequences)
const ansiEscapeRegex = new RegExp(
  String.fromCharCode(27) + "\\[[0-9;]*m",
  "g",
);

/** Get visible length of a cell value (strips ANSI escape codes) */
function cellWidth(value: string | undefined): number {
  if (value == null) return 0;
  return value.replace(ansiEscapeRegex, "").length;
}
