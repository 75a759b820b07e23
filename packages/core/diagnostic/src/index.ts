export {default} from './diagnostic';
export {
  errorToDiagnostic,
  anyToDiagnostic,
} from './diagnostic';
export type {Diagnostic, DiagnosticCode} from './diagnostic';
