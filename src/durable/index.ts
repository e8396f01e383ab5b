export {
  SnapshotFileStore,
  PRIMARY_FILE,
  emptySnapshot,
  serializeSnapshot,
  parseSnapshot,
  checksumOf,
} from './snapshot-file.js'
export type {
  SnapshotFs,
  SnapshotFileStoreOptions,
  LoadOptions,
  LoadResult,
  SaveResult,
  FileInfo,
} from './snapshot-file.js'
