/**
 * Plain-text table layout for terminal output.
 *
 * ```
 * Broken Links Summary
 * +-------+-----------------------+---------------------+
 * | Error | URL                   | Source              |
 * +-------+-----------------------+---------------------+
 * | 404   | https://example.com/b | https://example.com |
 * +-------+-----------------------+---------------------+
 * ```
 */

import stringWidth from "string-width";

export type Alignment = "left" | "right";

export interface Column {
  header: string;
  align?: Alignment;
}

/** Pad to `width` terminal columns; emoji and other wide characters take two. */
function pad(value: string, width: number, align: Alignment): string {
  const fill = " ".repeat(Math.max(0, width - stringWidth(value)));
  return align === "right" ? fill + value : value + fill;
}

/**
 * Lay out `rows` under `columns`, each column as wide as its widest cell
 * as displayed in a terminal.
 * Rows shorter than `columns` are padded with empty cells.
 */
export function renderTable(title: string, columns: readonly Column[], rows: readonly string[][]): string {
  const widths = columns.map((column, index) =>
    Math.max(stringWidth(column.header), ...rows.map((row) => stringWidth(row[index] ?? ""))),
  );

  const border = "+" + widths.map((width) => "-".repeat(width + 2)).join("+") + "+";
  const line = (cells: readonly string[], header: boolean): string =>
    "| " +
    columns
      .map((column, index) =>
        pad(cells[index] ?? "", widths[index], header ? "left" : (column.align ?? "left")),
      )
      .join(" | ") +
    " |";

  return [
    title,
    border,
    line(
      columns.map((column) => column.header),
      true,
    ),
    border,
    ...rows.map((row) => line(row, false)),
    border,
  ].join("\n");
}
