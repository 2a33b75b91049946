/**
 * Source diagnostics
 *
 * Renders a message pinned to an offset in a source text, compiler-style:
 *
 * ```
 * error: expected ">"
 *   --> page.tw:1:7
 *    |
 *  1 | <a b=1>
 *    |       ^
 *    |
 *    = note: attribute values must be quoted
 * ```
 */

import { config } from "./config.js";

// ============================================================================
// Types
// ============================================================================

export type Severity = "error" | "warning" | "info";

/** A 1-based line/column position plus the raw offset it was computed from. */
export interface SourceLocation {
  offset: number;
  line: number;
  /** Counted in code points, so astral characters occupy one column. */
  column: number;
}

export interface SourceDiagnostic {
  severity: Severity;
  message: string;
  /** The full text the offset points into */
  source: string;
  /** UTF-16 offset into `source` */
  offset: number;
  /** File or document name shown in the location line */
  name?: string;
  /** Text printed after the caret */
  label?: string;
  notes?: string[];
}

export interface RenderOptions {
  /** Source lines shown above the failing line (default: `diagnostics.context` config) */
  contextLines?: number;
  /** Emit ANSI colour codes (default: `diagnostics.color` config) */
  color?: boolean;
}

export interface PrintOptions extends RenderOptions {
  /** Custom writer function (default: console.error) */
  writer?: (text: string) => void;
}

// ============================================================================
// Locations
// ============================================================================

/**
 * Convert a zero-based offset to a 1-based line and column.
 */
export function locate(source: string, offset: number): SourceLocation {
  const clamped = Math.max(0, Math.min(offset, source.length));
  const before = source.slice(0, clamped);
  const lineStart = before.lastIndexOf("\n") + 1;
  let line = 1;
  for (let i = 0; i < lineStart; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  const column = Array.from(before.slice(lineStart)).length + 1;
  return { offset: clamped, line, column };
}

function getLineText(source: string, line: number): string {
  const text = source.split("\n")[line - 1] ?? "";
  return text.endsWith("\r") ? text.slice(0, -1) : text;
}

// ============================================================================
// Colour
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
} as const;

type Style = Exclude<keyof typeof COLORS, "reset">;

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

// ============================================================================
// Rendering
// ============================================================================

export function renderDiagnostic(
  diagnostic: SourceDiagnostic,
  options: RenderOptions = {}
): string {
  const contextLines = options.contextLines ?? config.getNumber("diagnostics.context", 1);
  const useColor = options.color ?? config.has("diagnostics.color");

  const color = (text: string, ...styles: Style[]): string => {
    if (!useColor || styles.length === 0) return text;
    return `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}`;
  };

  const severityClr = severityColor(diagnostic.severity);
  const { line, column } = locate(diagnostic.source, diagnostic.offset);
  const lines: string[] = [];

  lines.push(`${color(diagnostic.severity, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`);

  const where = diagnostic.name ? `${diagnostic.name}:${line}:${column}` : `${line}:${column}`;
  lines.push(`  ${color("-->", "blue")} ${where}`);

  const minLine = Math.max(1, line - Math.max(0, contextLines));
  const numWidth = String(line).length;
  const gutter = " ".repeat(numWidth);
  const bar = color("|", "blue");

  lines.push(` ${gutter} ${bar}`);
  for (let lineNum = minLine; lineNum <= line; lineNum++) {
    const lineNumStr = String(lineNum).padStart(numWidth);
    lines.push(` ${color(lineNumStr, "blue")} ${bar} ${getLineText(diagnostic.source, lineNum)}`);
  }

  const caret = " ".repeat(column - 1) + "^";
  const label = diagnostic.label ? ` ${diagnostic.label}` : "";
  lines.push(` ${gutter} ${bar} ${color(caret + label, severityClr)}`);

  const notes = diagnostic.notes ?? [];
  if (notes.length > 0) {
    lines.push(` ${gutter} ${bar}`);
    for (const note of notes) {
      lines.push(` ${gutter} ${color("= note:", "bold")} ${note}`);
    }
  }

  return lines.join("\n");
}

/**
 * Print a diagnostic to the console (stderr).
 */
export function printDiagnostic(diagnostic: SourceDiagnostic, options: PrintOptions = {}): void {
  const writer = options.writer ?? ((text: string) => console.error(text));
  writer(renderDiagnostic(diagnostic, options));
}
