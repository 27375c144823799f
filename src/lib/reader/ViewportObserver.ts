import { readerConfig } from './config';
import { pageDistance } from './page';
import type { ContentSection, ScrollIntent, SectionId, VisibilityEvent } from './types';
import { encodeClientScrollTo, pageFromSectionId, sectionIdForPage } from './wire';
import type { ClientScrollToPayload } from './wire';

/** Anything the viewport can be scrolled through (window or a scrolling element) */
export interface Scroller {
  scrollTo(options: ScrollToOptions): void;
}

/**
 * Best-effort mirror of the reading-progress control
 */
export interface SliderMirror {
  getValue(): number | null;
  setValue(page: number): void;
}

export type VisibilityEntry = Pick<IntersectionObserverEntry, 'target' | 'isIntersecting'>;

export interface VisibilityWatcher {
  observe(target: Element): void;
  disconnect(): void;
}

export type VisibilityWatcherFactory = (
  callback: (entries: VisibilityEntry[]) => void,
  init: IntersectionObserverInit
) => VisibilityWatcher;

export interface ViewportObserverOptions {
  /** Element whose top is the origin for section offsets */
  content: HTMLElement;
  slider: SliderMirror;
  /** Send a `scrollto` event to the progress controller */
  report: (payload: ClientScrollToPayload) => void;
  /** Called with every page the viewport settles on (resume cache) */
  onResumePoint?: (page: number) => void;
  /** IntersectionObserver root; null watches the browser viewport */
  root?: Element | null;
  scroller?: Scroller;
  threshold?: number;
  rootMargin?: string;
  hysteresisPages?: number;
  createWatcher?: VisibilityWatcherFactory;
  resolveSection?: (id: SectionId) => HTMLElement | null;
  debug?: boolean;
}

export type ScrollIntentOutcome = 'scrolled' | 'reconciled' | 'missing' | 'stale';

/**
 * Read a watcher entry as a section crossing; null for elements that are
 * not content sections
 */
export function toVisibilityEvent(entry: VisibilityEntry): VisibilityEvent | null {
  const page = pageFromSectionId(entry.target.id);
  if (page === null) return null;
  return { sectionId: sectionIdForPage(page), page, isIntersecting: entry.isIntersecting };
}

const defaultWatcherFactory: VisibilityWatcherFactory = (callback, init) =>
  new IntersectionObserver((entries) => callback(entries), init);

/**
 * ViewportObserver
 *
 * Watches which content section is visible and reports crossings to the
 * progress controller; applies the controller's scroll intents.
 *
 * Feedback between the two is cut in two places:
 * - crossings within `hysteresisPages` of the slider value are not reported
 * - confirmation-only intents for the section already on screen only
 *   reconcile the slider
 */
export class ViewportObserver {
  private readonly options: ViewportObserverOptions;
  private readonly watchers = new Map<SectionId, VisibilityWatcher>();
  private attachedSections: readonly ContentSection[] | null = null;
  private currentSectionId: SectionId | null = null;
  private lastIntentId = 0;

  constructor(options: ViewportObserverOptions) {
    this.options = options;
  }

  /**
   * Register one visibility watcher per section, replacing any previous set.
   * Sections not yet in the DOM are skipped.
   */
  attach(sections: readonly ContentSection[]): void {
    this.detach();

    const {
      root = null,
      threshold = readerConfig.intersectionThreshold,
      rootMargin = readerConfig.rootMargin,
      createWatcher = defaultWatcherFactory
    } = this.options;

    for (const section of sections) {
      const element = this.resolveSection(section.id);
      if (!element) continue;

      const watcher = createWatcher(
        (entries) => {
          entries.forEach((entry) => {
            const event = toVisibilityEvent(entry);
            if (event) {
              this.onIntersection(event.sectionId, event.isIntersecting);
            }
          });
        },
        { root, rootMargin, threshold }
      );
      watcher.observe(element);
      this.watchers.set(section.id, watcher);
    }
    this.attachedSections = sections;

    this.log(`attached ${this.watchers.size} of ${sections.length} sections`);
  }

  /**
   * Disconnect every visibility watcher
   */
  detach(): void {
    this.watchers.forEach((watcher) => watcher.disconnect());
    this.watchers.clear();
    this.attachedSections = null;
  }

  /**
   * Catch up with a render: watchers are re-registered first when a
   * different section list is mounted, then the pending intent is applied.
   */
  sync(sections: readonly ContentSection[], intent: ScrollIntent | null): ScrollIntentOutcome | null {
    if (sections !== this.attachedSections) {
      this.attach(sections);
    }
    return intent ? this.onScrollIntent(intent) : null;
  }

  get attachedCount(): number {
    return this.watchers.size;
  }

  get currentSection(): SectionId | null {
    return this.currentSectionId;
  }

  /**
   * Handle a visibility crossing.
   *
   * @returns true if a report was sent to the controller
   */
  onIntersection(sectionId: string, isIntersecting: boolean): boolean {
    if (!isIntersecting) return false;

    const page = pageFromSectionId(sectionId);
    if (page === null) return false;

    const { slider, report, onResumePoint, hysteresisPages = readerConfig.hysteresisPages } = this.options;
    const displayed = slider.getValue();
    if (displayed !== null && pageDistance(page, displayed) <= hysteresisPages) {
      return false;
    }

    // Update the control right away, the controller's confirmation follows
    slider.setValue(page);
    this.currentSectionId = `page_${page}`;
    onResumePoint?.(page);
    report(encodeClientScrollTo(page));
    this.log('reported', sectionId);
    return true;
  }

  /**
   * Apply a scroll intent from the controller
   */
  onScrollIntent(intent: ScrollIntent): ScrollIntentOutcome {
    if (intent.id <= this.lastIntentId) {
      return 'stale';
    }
    this.lastIntentId = intent.id;

    const { slider, content } = this.options;
    const scroller: Scroller = this.options.scroller ?? window;
    slider.setValue(intent.page);

    if (intent.confirmationOnly && this.currentSectionId === intent.sectionId) {
      return 'reconciled';
    }

    const element = this.resolveSection(intent.sectionId);
    if (!element) {
      console.warn(`[ViewportObserver] Section ${intent.sectionId} is not mounted, skipping scroll`);
      return 'missing';
    }

    scroller.scrollTo({ top: element.offsetTop - content.offsetTop, left: 0 });
    this.currentSectionId = intent.sectionId;
    this.log('scrolled to', intent.sectionId);
    return 'scrolled';
  }

  private resolveSection(id: SectionId): HTMLElement | null {
    const { resolveSection } = this.options;
    return resolveSection ? resolveSection(id) : document.getElementById(id);
  }

  private log(...args: unknown[]): void {
    if (this.options.debug ?? readerConfig.debug) {
      console.log('[ViewportObserver]', ...args);
    }
  }
}
