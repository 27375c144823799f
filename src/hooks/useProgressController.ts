'use client';

import { useEffect, useRef, useState } from 'react';
import { useRouter, useSearchParams } from 'next/navigation';
import { readerConfig } from '@/lib/reader/config';
import { parseReaderQuery } from '@/lib/reader/url';
import { createProgressStore, useResumeStore } from '@/store';
import type { ProgressStoreApi } from '@/store';

/**
 * Hook that owns the progress controller for one reader session.
 *
 * - Creates the controller once and points its URL writes at the router:
 *   reading moves push history entries, corrections replace the current one
 * - Adopts the requested page synchronously so server and client render
 *   the same sections
 * - Falls back to the session resume hint when no page was requested
 * - Feeds later query string changes (back/forward, deep links) back in
 */
export function useProgressController(requestedPage: string | null): ProgressStoreApi {
  const router = useRouter();
  const searchParams = useSearchParams();
  const routerRef = useRef(router);

  useEffect(() => {
    routerRef.current = router;
  }, [router]);

  const [store] = useState(() => {
    const created = createProgressStore({
      navigate: (href, mode) => {
        if (mode === 'push') {
          routerRef.current.push(href, { scroll: false });
        } else {
          routerRef.current.replace(href, { scroll: false });
        }
      }
    });
    if (requestedPage !== null) {
      created.getState().initialize(requestedPage);
    }
    return created;
  });

  // Resume hint lives in sessionStorage, so it can only be read after hydration
  useEffect(() => {
    if (store.getState().initialized) return;
    const resumeHint = useResumeStore.getState().getResumeHint(readerConfig.readerId);
    store.getState().initialize(null, { resumeHint });
  }, [store]);

  const search = searchParams.toString();
  const lastSearchRef = useRef(search);

  useEffect(() => {
    if (search === lastSearchRef.current) return;
    lastSearchRef.current = search;
    store.getState().onLocationChange(parseReaderQuery(new URLSearchParams(search)));
  }, [search, store]);

  return store;
}
