import { APP_CONFIG } from '../config';

/** Anything with the Web Storage read/write surface: sessionStorage, localStorage or an in-memory map. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export type SessionValue = string | number | boolean | object;

/**
 * Caller-owned key/value store for one user session. Computations read
 * carried-over defaults from it and write their outputs back; nothing else
 * holds state between runs.
 */
export interface SessionContext {
  getString(key: string, fallback?: string): string;
  getNumber(key: string, fallback?: number): number;
  getJson<T>(key: string, fallback: T, guard: (value: unknown) => value is T): T;
  has(key: string): boolean;
  set(key: string, value: SessionValue): void;
  remove(key: string): void;
}

export function createMemoryStorage(initial: Record<string, string> = {}): KeyValueStorage {
  const map = new Map<string, string>(Object.entries(initial));
  return {
    getItem: (key) => map.get(key) ?? null,
    setItem: (key, value) => {
      map.set(key, value);
    },
    removeItem: (key) => {
      map.delete(key);
    },
  };
}

export function createSessionContext(
  storage: KeyValueStorage = createMemoryStorage(),
  prefix: string = APP_CONFIG.sessionPrefix,
): SessionContext {
  const fullKey = (key: string) => `${prefix}${key}`;

  const read = (key: string): string | null => {
    try {
      return storage.getItem(fullKey(key));
    } catch (e) {
      console.error(`Failed to read session key "${key}"`, e);
      return null;
    }
  };

  const getString = (key: string, fallback = '') => read(key) ?? fallback;

  const getNumber = (key: string, fallback = 0) => {
    const raw = read(key);
    if (raw === null || raw.trim() === '') return fallback;
    const num = Number(raw);
    return Number.isFinite(num) ? num : fallback;
  };

  function getJson<T>(key: string, fallback: T, guard: (value: unknown) => value is T): T {
    const raw = read(key);
    if (!raw) return fallback;
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (e) {
      console.warn(`Ignoring unreadable session value "${key}"`, e);
      return fallback;
    }
    if (!guard(value)) {
      console.warn(`Ignoring session value "${key}" with an unexpected shape`);
      return fallback;
    }
    return value;
  }

  return {
    getString,
    getNumber,
    getJson,
    has: (key) => read(key) !== null,
    set: (key, value) => {
      const raw = typeof value === 'object' ? JSON.stringify(value) : String(value);
      try {
        storage.setItem(fullKey(key), raw);
      } catch (e) {
        console.error(`Failed to set session key "${key}"`, e);
      }
    },
    remove: (key) => {
      try {
        storage.removeItem(fullKey(key));
      } catch (e) {
        console.error(`Failed to remove session key "${key}"`, e);
      }
    },
  };
}
