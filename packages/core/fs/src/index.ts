export {NodeFS, isErrnoException} from './NodeFS';
export type {FilePath, FileSystem} from './NodeFS';
