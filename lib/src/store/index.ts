/**
 * Store Module
 *
 * Persisted chunk files and the file system adapter shared with the index store.
 */

export {
  FileChunkStore,
  ChunkHeaderSchema,
  CHUNK_FILE_EXTENSION,
  CHUNKS_DIR,
  chunkBuildDir,
  toChunkHeader,
  serializeChunkFile,
  parseChunkFile,
} from './chunk-store.js';

export type { ChunkStore, ChunkStoreOptions, ChunkHeader, StoredChunk } from './chunk-store.js';

export {
  nodeFileSystem,
  writeFileAtomic,
  runStoreOperation,
  errorCode,
  isNotFound,
} from './file-system.js';

export type { FileSystemIO, StoreOperationOptions } from './file-system.js';
