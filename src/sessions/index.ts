export { SessionManager, DEFAULT_IDLE_TIMEOUT_MS, type SessionManagerOptions } from './session-manager.js';
export {
  MemoryTranscriptStore,
  SQLiteTranscriptStore,
  type SQLiteTranscriptStoreConfig,
  type SessionRecord,
  type TranscriptStore,
} from './transcript-store.js';
