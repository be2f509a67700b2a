/**
 * @tessera/core
 *
 * Configuration and catalogued diagnostics shared by the tessera packages,
 * plus the `invariant` assertion.
 */

export { config, type TesseraConfig, type DiagnosticsConfig } from "./config.js";

export {
  DiagnosticCategory,
  DiagnosticBuilder,
  diagnostic,
  emitDiagnostic,
  interpolate,
  renderDiagnostic,
  setDiagnosticWriter,
  type Diagnostic,
  type DiagnosticArgs,
  type DiagnosticDescriptor,
  type DiagnosticWriter,
  type Severity,
} from "./diagnostics.js";

export { invariant } from "./safety.js";
