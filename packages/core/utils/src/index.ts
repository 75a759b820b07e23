export {default as PromiseQueue} from './PromiseQueue';
export {makeDeferredWithPromise} from './Deferred';
export type {Deferred} from './Deferred';
export {default as prettyDiagnostic} from './prettyDiagnostic';
export type {AnsiDiagnosticResult} from './prettyDiagnostic';
