'use client';

import { useEffect, useRef } from 'react';
import { useStore } from 'zustand';
import { readerConfig } from '@/lib/reader/config';
import { ViewportObserver } from '@/lib/reader/ViewportObserver';
import type { SliderMirror } from '@/lib/reader/ViewportObserver';
import { SCROLL_TO_EVENT } from '@/lib/reader/wire';
import type { ContentSection } from '@/lib/reader/types';
import type { ProgressStoreApi } from '@/store/progressStore';
import { useResumeStore } from '@/store/resumeStore';

interface UseViewportObserverOptions {
  store: ProgressStoreApi;
  contentRef: React.RefObject<HTMLElement | null>;
  slider: SliderMirror;
  /** Sections currently rendered; a new array re-registers the watchers */
  sections: readonly ContentSection[];
}

/**
 * Hook that connects the DOM to the progress controller.
 *
 * Visibility crossings go to the controller as `scrollto` events; the
 * controller's pending scroll intent is applied after the commit that
 * rendered its target section.
 */
export function useViewportObserver({
  store,
  contentRef,
  slider,
  sections
}: UseViewportObserverOptions) {
  const recordPage = useResumeStore(state => state.recordPage);
  const pendingIntent = useStore(store, state => state.pendingIntent);
  const observerRef = useRef<ViewportObserver | null>(null);

  useEffect(() => {
    const content = contentRef.current;
    if (!content) return;

    const observer = new ViewportObserver({
      content,
      slider,
      report: (payload) => store.getState().receiveClientEvent(SCROLL_TO_EVENT, payload),
      onResumePoint: (page) => recordPage(readerConfig.readerId, page)
    });
    observerRef.current = observer;

    return () => {
      observer.detach();
      observerRef.current = null;
    };
  }, [store, contentRef, slider, recordPage]);

  // Sections rendered in this commit are watched before the intent targets them
  useEffect(() => {
    const observer = observerRef.current;
    if (!observer) return;

    observer.sync(sections, pendingIntent);
    if (pendingIntent) {
      store.getState().acknowledgeIntent(pendingIntent.id);
    }
  }, [pendingIntent, sections, store, contentRef, slider, recordPage]);
}
