export function formatDuration(durationMs: number): string {
  if (durationMs < 1000) {
    return `${durationMs}ms`;
  }
  const seconds = durationMs / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds - minutes * 60);
  return `${minutes}m${String(rest).padStart(2, "0")}s`;
}

export function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const top = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => {
    const padding = " ".repeat(width - line.length);
    return `| ${line}${padding} |`;
  });
  return [top, ...body, top].join("\n");
}

export function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const renderRow = (row: readonly string[]): string =>
    `| ${row.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(" | ")} |`;
  return [border, renderRow(headers), border, ...rows.map(renderRow), border].join(
    "\n",
  );
}

export function truncateText(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, Math.max(0, max - 3))}...`;
}
