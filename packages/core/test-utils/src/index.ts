export {MemoryVersionControl} from './MemoryVersionControl';
export type {
  MemoryVersionControlOptions,
  RevisionFiles,
} from './MemoryVersionControl';
export {MemoryFS} from './MemoryFS';
