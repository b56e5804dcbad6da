/*
Purpose: render CLI failures (thrown errors and smoke verdict errors) for stderr.
Assumptions: non-TTY output never gets ANSI escapes.
Usage: console.error(renderCliError(err, { debug })).
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineLayout = {
  label?: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  block?: boolean;
};

const LINE_LAYOUTS: Record<ErrorFormatLineKind, LineLayout> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const layout = LINE_LAYOUTS[line.kind];
  if (!layout.label) {
    return format(line.text, layout.textStyles);
  }

  const label = format(layout.label, layout.labelStyles);
  if (layout.block) {
    const indented = line.text
      .split("\n")
      .map((row) => `  ${row}`)
      .join("\n");
    return `${label}\n${format(indented, layout.textStyles)}`;
  }

  return `${label} ${format(line.text, layout.textStyles)}`;
}
