export {GitVersionControl, runGit} from './GitVersionControl';
export type {GitResult, GitRunner} from './GitVersionControl';
export {VcsError} from './VcsError';
export type {VcsErrorKind} from './VcsError';
export {findRepositoryRoot, findRoot} from './findRepositoryRoot';
export {resolveBaseline, DEFAULT_BASELINES} from './resolveBaseline';
export type {Ref, VersionControl} from './types';
