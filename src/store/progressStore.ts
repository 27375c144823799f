import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { readerConfig } from '@/lib/reader/config';
import { clampPage, pageDistance, parsePage, resolvePage } from '@/lib/reader/page';
import type { RawPageInput } from '@/lib/reader/page';
import { buildReaderHref } from '@/lib/reader/url';
import type { ReaderQuery } from '@/lib/reader/url';
import {
  SCROLL_TO_EVENT,
  decodeClientScrollTo,
  encodeServerScrollTo,
  sectionIdForPage
} from '@/lib/reader/wire';
import type { ServerScrollToPayload } from '@/lib/reader/wire';
import type { NavigationEvent, ScrollIntent, SliderOrigin } from '@/lib/reader/types';

/** `push` adds a history entry, `replace` rewrites the current one */
export type HistoryMode = 'push' | 'replace';

export type ScrollIntentListener = (intent: ScrollIntent, payload: ServerScrollToPayload) => void;

export interface ProgressControllerOptions {
  /** Rewrite the shareable URL without a full reload */
  navigate: (href: string, mode: HistoryMode) => void;
  maxPage?: number;
  hysteresisPages?: number;
  basePath?: string;
  debug?: boolean;
}

export interface InitializeOptions {
  /** Last page from the resume cache; used only when no page was requested */
  resumeHint?: number | null;
}

interface ProgressState {
  /** Authoritative reading position */
  position: number;
  initialized: boolean;
  /** Latest intent not yet acknowledged by the observer */
  pendingIntent: ScrollIntent | null;
}

interface ProgressActions {
  initialize: (requestedPage?: RawPageInput, options?: InitializeOptions) => void;
  onSliderChange: (newPage: RawPageInput, origin: SliderOrigin) => void;
  onScrollReport: (observedPage: number) => void;
  onDirectNavigation: (pageFromURL: RawPageInput) => void;
  dispatch: (event: NavigationEvent) => void;
  /**
   * Reconcile a change of the URL's query string.
   * Echoes of hrefs the controller wrote itself are ignored; anything else
   * is a direct navigation.
   */
  onLocationChange: (query: ReaderQuery) => void;
  /** Wire entry point for events pushed by the client */
  receiveClientEvent: (event: string, payload: unknown) => void;
  /** Mark an intent as consumed so it is not replayed on re-attach */
  acknowledgeIntent: (intentId: number) => void;
  subscribeToScrollIntent: (listener: ScrollIntentListener) => () => void;
}

export type ProgressStore = ProgressState & ProgressActions;
export type ProgressStoreApi = StoreApi<ProgressStore>;

/**
 * Create the progress controller for one reader session.
 *
 * The controller owns the reading position and pushes it outward: to the
 * URL through `navigate`, and to the viewport observer as scroll intents.
 * Events are handled strictly one at a time; a transition requested from
 * inside a listener runs after the current one completes.
 */
export function createProgressStore(options: ProgressControllerOptions): ProgressStoreApi {
  const {
    navigate,
    maxPage = readerConfig.maxPage,
    hysteresisPages = readerConfig.hysteresisPages,
    basePath = readerConfig.basePath,
    debug = readerConfig.debug
  } = options;

  const listeners = new Set<ScrollIntentListener>();
  const queue: Array<() => void> = [];
  let processing = false;
  let intentSequence = 0;
  // Hrefs written by the controller whose location change has not come back yet
  let pendingEchoes: string[] = [];

  const log = (...args: unknown[]) => {
    if (debug) {
      console.log('[ProgressController]', ...args);
    }
  };

  const run = (task: () => void) => {
    queue.push(task);
    if (processing) return;

    processing = true;
    try {
      while (queue.length > 0) {
        const next = queue.shift();
        next?.();
      }
    } finally {
      processing = false;
    }
  };

  return createStore<ProgressStore>()((set, get) => {
    const writeUrl = (page: number, fromScroll: boolean, mode: HistoryMode) => {
      const href = buildReaderHref(page, { fromScroll, basePath });
      pendingEchoes.push(href);
      try {
        navigate(href, mode);
      } catch (error) {
        console.error('[ProgressController] Failed to update URL:', error);
      }
    };

    const emitIntent = (page: number, confirmationOnly: boolean) => {
      intentSequence += 1;
      const intent: ScrollIntent = {
        id: intentSequence,
        page,
        sectionId: sectionIdForPage(page),
        confirmationOnly
      };
      set({ pendingIntent: intent });
      log('scroll intent', intent);

      const payload = encodeServerScrollTo(intent);
      listeners.forEach((listener) => {
        try {
          listener(intent, payload);
        } catch (error) {
          console.error('[ProgressController] Scroll intent listener failed:', error);
        }
      });
    };

    const adoptPage = (page: number) => {
      set({ position: page });
      log('position', page);
    };

    const sliderChange = (newPage: RawPageInput, origin: SliderOrigin) => {
      const page = resolvePage(newPage, maxPage);
      if (page === get().position) return;

      adoptPage(page);
      writeUrl(page, origin === 'scroll', 'push');
      // A scroll-originated change is already on screen
      if (origin === 'slider') {
        emitIntent(page, false);
      }
    };

    const scrollReport = (observedPage: number) => {
      const page = clampPage(observedPage, maxPage);
      const { position } = get();
      if (pageDistance(page, position) <= hysteresisPages) {
        log('scroll report ignored', { observed: page, position });
        return;
      }

      adoptPage(page);
      writeUrl(page, true, 'push');
      emitIntent(page, true);
    };

    const directNavigation = (pageFromURL: RawPageInput) => {
      const page = resolvePage(pageFromURL, maxPage);
      adoptPage(page);
      emitIntent(page, false);
    };

    return {
      position: 1,
      initialized: false,
      pendingIntent: null,

      initialize: (requestedPage, initOptions = {}) => {
        run(() => {
          const requested = parsePage(requestedPage);
          const { resumeHint = null } = initOptions;
          const noPageRequested = requestedPage === undefined || requestedPage === null;

          if (requested !== null) {
            const page = clampPage(requested, maxPage);
            set({ position: page, initialized: true });
            // Clamped or leniently parsed requests get their canonical URL
            const raw = Array.isArray(requestedPage) ? requestedPage[0] : requestedPage;
            if (String(raw) !== String(page)) {
              writeUrl(page, false, 'replace');
            }
            if (page > 1) {
              emitIntent(page, false);
            }
          } else if (noPageRequested && resumeHint !== null) {
            const page = clampPage(resumeHint, maxPage);
            set({ position: page, initialized: true });
            writeUrl(page, false, 'replace');
            emitIntent(page, false);
          } else if (noPageRequested) {
            set({ position: 1, initialized: true });
          } else {
            set({ position: 1, initialized: true });
            writeUrl(1, false, 'replace');
          }

          log('initialized', get().position);
        });
      },

      onSliderChange: (newPage, origin) => {
        run(() => sliderChange(newPage, origin));
      },

      onScrollReport: (observedPage) => {
        run(() => scrollReport(observedPage));
      },

      onDirectNavigation: (pageFromURL) => {
        run(() => directNavigation(pageFromURL));
      },

      dispatch: (event) => {
        run(() => {
          switch (event.type) {
            case 'slider-drag':
              sliderChange(event.page, 'slider');
              break;
            case 'scroll-confirm':
              scrollReport(event.page);
              break;
            case 'direct-link':
              directNavigation(event.page);
              break;
          }
        });
      },

      onLocationChange: (query) => {
        run(() => {
          // A missing or malformed page means the first page
          if (query.page === null) {
            directNavigation(null);
            return;
          }

          const href = buildReaderHref(query.page, { fromScroll: query.fromScroll, basePath });
          const echoIndex = pendingEchoes.indexOf(href);
          if (echoIndex !== -1) {
            // Our own write coming back; older echoes can no longer arrive
            pendingEchoes = pendingEchoes.slice(echoIndex + 1);
            return;
          }

          directNavigation(query.page);
        });
      },

      receiveClientEvent: (event, payload) => {
        if (event !== SCROLL_TO_EVENT) {
          console.warn(`[ProgressController] Ignoring unknown client event "${event}"`);
          return;
        }
        const page = decodeClientScrollTo(payload);
        if (page === null) return;
        get().dispatch({ type: 'scroll-confirm', page });
      },

      acknowledgeIntent: (intentId) => {
        if (get().pendingIntent?.id === intentId) {
          set({ pendingIntent: null });
        }
      },

      subscribeToScrollIntent: (listener) => {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      }
    };
  });
}
