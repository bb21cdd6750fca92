import React, { useMemo } from 'react';
import { ProposalSection } from './components/ProposalSection';
import { Layout } from './components/Layout';
import { createMemoryStorage, createSessionContext } from './utils/session';
import type { KeyValueStorage } from './utils/session';

function browserSessionStorage(): KeyValueStorage {
  try {
    if (typeof window !== 'undefined' && window.sessionStorage) return window.sessionStorage;
  } catch (e) {
    console.error('sessionStorage is unavailable; falling back to memory', e);
  }
  return createMemoryStorage();
}

function App() {
  const session = useMemo(() => createSessionContext(browserSessionStorage()), []);

  return (
    <Layout>
      <ProposalSection session={session} />
    </Layout>
  );
}

export default App;
