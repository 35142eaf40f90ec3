/**
 * Configuration types for session-beacon
 */

export type SyncRole = "source" | "remote";
export type StoreBackend = "firestore" | "memory";
export type InjectionMethod = "osascript" | "tmux" | "none";

export interface AppConfig {
  /** Which side of the round trip this process plays */
  role: SyncRole;

  /** Name written into every published session record */
  deviceName: string;

  /** Remote store implementation */
  storeBackend: StoreBackend;

  /** Firebase project for the firestore backend */
  firebaseProjectId?: string;

  /** Prefix for firestore collection names, lets several installs share a project */
  collectionPrefix: string;

  /** Directory the CLI hook writes status and prompt files into */
  statusDir: string;

  /** Directory for fallback response files */
  responseDir: string;

  /** File name prefix of status files, e.g. beacon-<session>.json */
  statusFilePrefix: string;

  /** Local detector polling interval */
  pollIntervalMs: number;

  /** Per-session upload debounce, always below pollIntervalMs */
  uploadDebounceMs: number;

  /** Source-side response poller interval */
  responsePollIntervalMs: number;

  /** Remote-side fallback refresh interval */
  remoteRefreshIntervalMs: number;

  /** Remote query window: records older than this are not active */
  sessionExpirationMs: number;

  /** Local status files older than this are removed */
  localSessionTimeoutMs: number;

  /** Only check the session pid once the status file is this old */
  pidCheckAfterMs: number;

  /** Run the stale cleanup sweep once every N ticks */
  cleanupEveryTicks: number;

  /** Page size for remote queries */
  queryPageSize: number;

  /** Local delivery mechanism for remote responses */
  injectionMethod: InjectionMethod;

  /** Telegram bot token (required for the remote role) */
  botToken: string;

  /** Telegram user allowed to use the console, also the alert chat */
  allowedUserId: string;

  /** Base directory for local state */
  dataDir: string;

  /** Lock file for the configured role */
  lockFile: string;

  /** Environment mode */
  nodeEnv: "development" | "production" | "test";

  /** Log level */
  logLevel: "debug" | "info" | "warn" | "error";
}
