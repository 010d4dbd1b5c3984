import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

/** Runtime configuration, read from the environment once at start-up. */
export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  production: boolean;
  /** Allowed CORS origin in production; false disables CORS there. */
  corsOrigin: string | false;
  /** Messages database (opened read-only). */
  chatDbPath: string;
  /** Contacts.app AddressBook directory. */
  addressBookDir: string;
  /** Prebuilt front end served at `/` when the directory exists. */
  publicDir: string;
  /** Where converted HEIC attachments are cached. */
  imageCacheDir: string;
  imageConvertTimeoutMs: number;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const home = homedir();
  return {
    port: intFromEnv(env.PORT, 3000),
    host: env.HOST ?? '127.0.0.1',
    logLevel: env.LOG_LEVEL ?? 'info',
    production: env.NODE_ENV === 'production',
    corsOrigin: env.CORS_ORIGIN ?? false,
    chatDbPath: env.CHAT_DB_PATH ?? join(home, 'Library', 'Messages', 'chat.db'),
    addressBookDir:
      env.ADDRESS_BOOK_DIR ?? join(home, 'Library', 'Application Support', 'AddressBook'),
    publicDir: resolve(env.PUBLIC_DIR ?? './public'),
    imageCacheDir: env.IMAGE_CACHE_DIR ?? join(tmpdir(), 'on-this-day-cache'),
    imageConvertTimeoutMs: intFromEnv(env.IMAGE_CONVERT_TIMEOUT_MS, 10_000),
  };
}
