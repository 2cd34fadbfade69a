import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "@declbind/binder";

type Position = { index: number; line: number; column: number };

type SpanContext = {
  path: string;
  start: Position;
  end: Position;
  lineText: string;
};

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

/** Source text by path; `undefined` when the file cannot be read. */
export type SourceCache = Map<string, string | undefined>;

export type CliDiagnosticOptions = {
  color?: boolean;
  sources?: SourceCache;
};

const clampIndex = (value: number, max: number): number =>
  Math.min(Math.max(value, 0), max);

const createLineStarts = (source: string): number[] => {
  const starts = [0];
  for (let i = 0; i < source.length; i += 1) {
    if (source[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
};

const positionAt = (starts: readonly number[], index: number): Position => {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const middle = Math.ceil((low + high) / 2);
    if ((starts[middle] ?? 0) <= index) {
      low = middle;
    } else {
      high = middle - 1;
    }
  }
  return { index, line: low + 1, column: index - (starts[low] ?? 0) };
};

// Spans name files by path or by `file:` uri; other schemes have no source.
const toLocalPath = (file: string): string | undefined => {
  if (file.startsWith("file:")) return fileURLToPath(file);
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(file)) return undefined;
  return isAbsolute(file) ? file : resolve(file);
};

const readSource = (path: string, sources: SourceCache): string | undefined => {
  if (sources.has(path)) {
    return sources.get(path);
  }
  let source: string | undefined;
  try {
    source = readFileSync(path, "utf8");
  } catch {
    source = undefined;
  }
  sources.set(path, source);
  return source;
};

const resolveSpanContext = (
  span: SourceSpan,
  sources: SourceCache,
): SpanContext | undefined => {
  const path = toLocalPath(span.file);
  const source = path === undefined ? undefined : readSource(path, sources);
  if (path === undefined || source === undefined) {
    return undefined;
  }

  const lineStarts = createLineStarts(source);
  const boundedStart = clampIndex(span.start, source.length);
  const boundedEnd = clampIndex(span.end, source.length);
  const start = positionAt(lineStarts, boundedStart);
  const end = positionAt(lineStarts, Math.max(boundedEnd, boundedStart));
  const lineText = source.split("\n")[start.line - 1] ?? "";

  return { path, start, end, lineText };
};

const colorForSeverity = (
  severity: DiagnosticSeverity,
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  return {
    severityLabel: (severity) =>
      `\u001B[1m${colorForSeverity(severity)(severity.toUpperCase())}\u001B[0m`,
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: (text) => `\u001B[2m${text}\u001B[0m`,
  };
};

const formatSnippet = ({
  diagnostic,
  span,
  color,
}: {
  diagnostic: Diagnostic;
  span: SpanContext;
  color: Colorizer;
}): string => {
  const { lineText, start, end } = span;
  const lastColumn = lineText.length;
  const highlightEnd =
    end.line === start.line ? Math.min(end.column, lastColumn) : lastColumn;
  const pointerLength = Math.max(1, highlightEnd - start.column);
  const gutter = `${start.line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column)}${color.pointer(
    diagnostic.severity,
    "^".repeat(pointerLength),
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

const formatLocation = ({
  span,
  context,
}: {
  span: SourceSpan;
  context?: SpanContext;
}): string =>
  context
    ? `${span.file}:${context.start.line}:${context.start.column + 1}`
    : `${span.file}:${span.start}-${span.end}`;

const formatRelated = ({
  related,
  color,
  sources,
}: {
  related: Diagnostic;
  color: Colorizer;
  sources: SourceCache;
}): string => {
  const context = resolveSpanContext(related.span, sources);
  const location = formatLocation({ span: related.span, context });
  return `  = ${color.pointer(related.severity, related.severity)}: ${
    related.message
  } (${location})`;
};

/**
 * Renders a diagnostic as a located header, followed by the source line when
 * the span's file can be read, related notes and hints.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: CliDiagnosticOptions = {},
): string => {
  const color = createColorizer(options.color ?? true);
  const sources = options.sources ?? new Map();
  const context = resolveSpanContext(diagnostic.span, sources);
  const location = formatLocation({ span: diagnostic.span, context });
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${location} ${color.severityLabel(
    diagnostic.severity,
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;

  return [
    header,
    context ? formatSnippet({ diagnostic, span: context, color }) : undefined,
    ...(diagnostic.related ?? []).map((related) =>
      formatRelated({ related, color, sources }),
    ),
    ...(diagnostic.hints ?? []).map(({ message }) => `  = help: ${message}`),
  ]
    .filter((line): line is string => line !== undefined)
    .join("\n");
};
