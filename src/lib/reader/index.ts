export { readerConfig, MAX_PAGE, MIN_PAGE } from './config';
export { parsePage, clampPage, resolvePage, pageDistance } from './page';
export { parseReaderQuery, buildReaderHref, SCROLL_ACT } from './url';
export {
  SCROLL_TO_EVENT,
  sectionIdForPage,
  pageFromSectionId,
  encodeClientScrollTo,
  encodeServerScrollTo,
  decodeClientScrollTo
} from './wire';
export { ViewportObserver, toVisibilityEvent } from './ViewportObserver';
export type { ReaderConfig } from './config';
export type { RawPageInput } from './page';
export type { ReaderQuery, ReaderHrefOptions, QuerySource } from './url';
export type { ClientScrollToPayload, ServerScrollToPayload } from './wire';
export type {
  SectionId,
  ContentSection,
  ScrollIntent,
  VisibilityEvent,
  SliderOrigin,
  NavigationEvent
} from './types';
export type {
  ViewportObserverOptions,
  Scroller,
  SliderMirror,
  VisibilityEntry,
  VisibilityWatcher,
  VisibilityWatcherFactory,
  ScrollIntentOutcome
} from './ViewportObserver';
