// Re-export all stores for convenient imports
export {
  createProgressStore,
  type ProgressStore,
  type ProgressStoreApi,
  type ProgressControllerOptions,
  type InitializeOptions,
  type ScrollIntentListener,
  type HistoryMode
} from './progressStore';
export { useResumeStore, type ResumePoint } from './resumeStore';
