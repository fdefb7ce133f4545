export * from './pipeline/types';
export { run, emptySummary, type RunOptions } from './pipeline/scheduler';
export { createWorker, type Worker, type WorkerDeps } from './pipeline/worker';
export { FileLedger, checksumFile, type Ledger } from './pipeline/ledger';
export {
  captureReporter,
  consoleReporter,
  fanOut,
  silentReporter,
  type ProgressReporter,
} from './pipeline/progress';
export { resolve, resolveAll, searchCatalog, listUserPlaylists, type Source } from './lib/resolver';
export { authenticate, type Credentials, type Session } from './lib/session';
export { commandAudioSource, type AudioSource, type AudioQuality } from './lib/audioSource';
export { CatalogClient, parseSpotifyUrl, sanitizeName } from './lib/catalog';
export * from './lib/errors';
