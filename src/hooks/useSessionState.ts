import { useState, useEffect } from 'react';
import type { SessionContext } from '../utils/session';

export function useSessionNumber(session: SessionContext, key: string, initial: number) {
  const [val, setVal] = useState<number>(() => session.getNumber(key, initial));
  useEffect(() => {
    session.set(key, val);
  }, [session, key, val]);
  return [val, setVal] as const;
}

export function useSessionString(session: SessionContext, key: string, initial: string) {
  const [val, setVal] = useState<string>(() => session.getString(key, initial));
  useEffect(() => {
    session.set(key, val);
  }, [session, key, val]);
  return [val, setVal] as const;
}

// Like useSessionString, but a stored value outside `options` falls back to `initial`.
export function useSessionChoice<T extends string>(session: SessionContext, key: string, initial: T, options: readonly T[]) {
  const [val, setVal] = useState<T>(() => {
    const raw = session.getString(key, initial);
    return options.find(o => o === raw) ?? initial;
  });
  useEffect(() => {
    session.set(key, val);
  }, [session, key, val]);
  return [val, setVal] as const;
}

// Stored JSON that fails `guard` is ignored in favour of `initial`.
export function useSessionState<T extends object>(
  session: SessionContext,
  key: string,
  initial: T,
  guard: (value: unknown) => value is T,
) {
  const [val, setVal] = useState<T>(() => session.getJson(key, initial, guard));
  useEffect(() => {
    session.set(key, val);
  }, [session, key, val]);
  return [val, setVal] as const;
}
