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

type LineStyle = {
  label?: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  block?: boolean;
};

const DIM: AnsiStyle[] = ["dim"];

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: DIM, textStyles: DIM },
  name: { label: "Name:", labelStyles: DIM, textStyles: DIM },
  cause: { label: "Cause:", labelStyles: DIM, textStyles: DIM },
  stack: { label: "Stack:", labelStyles: DIM, textStyles: DIM, block: true },
};

// Colors only reach a TTY; NO_COLOR turns them off unless useColor says otherwise.
export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return formatErrorLines(error, { mode: options.debug ? "debug" : "short" })
    .map((line) => renderLine(line, format))
    .join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (!style.label) {
    return format(line.text, style.textStyles);
  }

  const label = format(style.label, style.labelStyles);
  if (style.block) {
    const body = line.text
      .split("\n")
      .map((text) => `  ${text}`)
      .join("\n");
    return `${label}\n${format(body, style.textStyles)}`;
  }
  return `${label} ${format(line.text, style.textStyles)}`;
}
