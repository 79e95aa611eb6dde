export { ReloadState } from './state.js';
export {
    FileChangeWatcher,
    snapshotFiles,
    snapshotsEqual,
    type FileChangeWatcherOptions,
    type FileSnapshot,
} from './watcher.js';
export { liveReloadScript } from './script.js';
