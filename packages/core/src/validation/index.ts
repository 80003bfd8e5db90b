export { validateModel, formatDiagnostics } from "./validator"
export type { Diagnostic, DiagnosticCode } from "./validator"
