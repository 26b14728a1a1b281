import type { ChangelogEntry, Recipe } from "../recipe/index.js";
import {
  formatDuration,
  renderAsciiBox,
  renderAsciiTable,
  truncateText,
} from "./report-utils.js";
import type { RunReport } from "./types.js";

export interface MarkdownRenderOptions {
  readonly maxFiles?: number;
}

const DETAIL_WIDTH = 60;

export function renderMarkdownReport(
  report: RunReport,
  options: MarkdownRenderOptions = {},
): string {
  const lines: string[] = [];

  lines.push(
    renderAsciiBox([
      `Package: ${report.package.nevr}`,
      `Result: ${report.ok ? "success" : "failed"}`,
      `Source: ${report.source.archive}`,
      `${report.source.algorithm}: ${report.source.expected}`,
    ]),
  );
  lines.push("");
  lines.push(
    renderAsciiTable(
      report.stages.map((stage) => [
        stage.name,
        stage.status,
        stage.status === "passed" || stage.status === "failed"
          ? formatDuration(stage.duration_ms)
          : "-",
        truncateText(stage.detail ?? "", DETAIL_WIDTH),
      ]),
      ["Stage", "Status", "Time", "Detail"],
    ),
  );

  if (report.error) {
    lines.push("");
    lines.push("### Error");
    lines.push("");
    lines.push(`[${report.error.stage ?? "-"}] ${report.error.message}`);
    if (report.source.actual && report.error.kind === "integrity") {
      lines.push(`expected: ${report.source.expected}`);
      lines.push(`actual:   ${report.source.actual}`);
    }
  }

  if (report.files.length === 0) {
    return lines.join("\n");
  }

  lines.push("");
  lines.push("### Files");
  lines.push("");
  const limit = options.maxFiles;
  const shown =
    limit && limit > 0 ? report.files.slice(0, limit) : [...report.files];
  for (const file of shown) {
    lines.push(`- ${file}`);
  }
  if (shown.length < report.files.length) {
    lines.push(`- ... ${report.files.length - shown.length} more`);
  }
  if (report.docs.length > 0) {
    lines.push("");
    lines.push("### Docs");
    lines.push("");
    for (const doc of report.docs) {
      lines.push(`- ${doc}`);
    }
  }

  return lines.join("\n");
}

export function renderRecipeInfo(recipe: Recipe): string {
  const { descriptor, source } = recipe;
  const header = renderAsciiBox([
    `${descriptor.name} ${descriptor.version}-${descriptor.release}`,
    descriptor.summary,
  ]);
  const rows: string[][] = [
    ["License", descriptor.license],
    ["URL", descriptor.url],
    ["Source", source.url],
    [source.digest.algorithm, source.digest.hex],
  ];
  if (descriptor.group) {
    rows.splice(1, 0, ["Group", descriptor.group]);
  }
  const lines = [header, "", renderAsciiTable(rows, ["Field", "Value"])];

  if (descriptor.description) {
    lines.push("", descriptor.description);
  }
  lines.push("", `Requires: ${listOrNone(descriptor.requires)}`);
  lines.push(`BuildRequires: ${listOrNone(descriptor.build_requires)}`);

  if (recipe.changelog.length > 0) {
    lines.push("", "### Changelog", "");
    for (const entry of recipe.changelog) {
      lines.push(...renderChangelogEntry(entry), "");
    }
    lines.pop();
  }
  return lines.join("\n");
}

function renderChangelogEntry(entry: ChangelogEntry): string[] {
  return [
    `* ${entry.date} ${entry.author} ${entry.version}`,
    ...entry.changes.map((change) => `- ${change}`),
  ];
}

function listOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(", ") : "(none)";
}
