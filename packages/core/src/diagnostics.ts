/**
 * Catalogued diagnostics
 *
 * A descriptor fixes a diagnostic's code, severity, category and message
 * template; a builder fills the template's `{placeholders}` and attaches notes.
 * Finished diagnostics are rendered as
 *
 * ```
 * info[TM2001]: Matrices of size 2x3 and 3x2 are never equal
 *    = note: equality is only checked between matrices with the same number of rows and columns
 * ```
 *
 * and printed through a swappable writer (`console.error` by default).
 */

import { config } from "./config.js";

export enum DiagnosticCategory {
  Construction = "construction",
  Shape = "shape",
  Selection = "selection",
  Access = "access",
  Equality = "equality",
}

export type Severity = "error" | "warning" | "info";

export interface DiagnosticDescriptor {
  /** Stable catalog code, e.g. "TM1002" */
  readonly code: string;
  readonly severity: Severity;
  readonly category: DiagnosticCategory;
  /** Message with `{name}` placeholders */
  readonly messageTemplate: string;
}

export type DiagnosticArgs = Readonly<Record<string, string | number>>;

export interface Diagnostic {
  code: string;
  severity: Severity;
  category: DiagnosticCategory;
  message: string;
  notes: string[];
}

/** Substitute `{name}` with `args.name`; unknown placeholders stay as written. */
export function interpolate(template: string, args: DiagnosticArgs): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.hasOwn(args, name) ? String(args[name]) : placeholder
  );
}

export class DiagnosticBuilder {
  private args: DiagnosticArgs = {};
  private readonly notes: string[] = [];

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly emitter: (diagnostic: Diagnostic) => void
  ) {}

  withArgs(args: DiagnosticArgs): this {
    this.args = { ...this.args, ...args };
    return this;
  }

  note(text: string): this {
    this.notes.push(text);
    return this;
  }

  build(): Diagnostic {
    const { code, severity, category, messageTemplate } = this.descriptor;
    return {
      code,
      severity,
      category,
      message: interpolate(messageTemplate, this.args),
      notes: [...this.notes],
    };
  }

  emit(): void {
    this.emitter(this.build());
  }
}

// ============================================================================
// Rendering
// ============================================================================

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

type Style = keyof typeof ANSI;

const SEVERITY_STYLE: Record<Severity, Style> = {
  error: "red",
  warning: "yellow",
  info: "cyan",
};

function paint(text: string, styles: Style[], enabled: boolean): string {
  if (!enabled) return text;
  return `${styles.map((s) => ANSI[s]).join("")}${text}${ANSI.reset}`;
}

export function renderDiagnostic(diagnostic: Diagnostic): string {
  const colors = !process.env.NO_COLOR && config.flag("diagnostics.colors", false);
  const { severity, code, message, notes } = diagnostic;
  const header =
    `${paint(`${severity}[${code}]`, ["bold", SEVERITY_STYLE[severity]], colors)}: ` +
    paint(message, ["bold"], colors);
  return [header, ...notes.map((n) => `   ${paint("= note:", ["bold"], colors)} ${n}`)].join("\n");
}

// ============================================================================
// Emission
// ============================================================================

export type DiagnosticWriter = (line: string) => void;

const stderrWriter: DiagnosticWriter = (line) => console.error(line);
let writer = stderrWriter;

/** Install `next` (or restore the stderr writer) and return the one it replaces. */
export function setDiagnosticWriter(next: DiagnosticWriter | undefined): DiagnosticWriter {
  const previous = writer;
  writer = next ?? stderrWriter;
  return previous;
}

/** No-op while `diagnostics.enabled` is false. */
export function emitDiagnostic(diagnostic: Diagnostic): void {
  if (config.flag("diagnostics.enabled", true)) {
    writer(renderDiagnostic(diagnostic));
  }
}

export function diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder {
  return new DiagnosticBuilder(descriptor, emitDiagnostic);
}
