/**
 * Reader synchronization types
 */

/** DOM identity of a content section: "page_12" */
export type SectionId = `page_${number}`;

/**
 * A rendered block of content tied to exactly one page number
 */
export interface ContentSection {
  readonly id: SectionId;
  readonly page: number;
  readonly partId: string;
}

/**
 * Command to move the viewport to a section.
 * Confirmation-only intents follow a scroll that already happened; the
 * observer reconciles its slider but does not scroll again.
 */
export interface ScrollIntent {
  /** Sequence number; a newer intent supersedes any unconsumed older one */
  id: number;
  page: number;
  sectionId: SectionId;
  confirmationOnly: boolean;
}

/**
 * Report that a section crossed the visibility threshold
 */
export interface VisibilityEvent {
  sectionId: SectionId;
  page: number;
  isIntersecting: boolean;
}

/** Where a slider value change came from */
export type SliderOrigin = 'slider' | 'scroll';

export type NavigationEvent =
  | { type: 'slider-drag'; page: number }
  | { type: 'scroll-confirm'; page: number }
  | { type: 'direct-link'; page: number };
