/**
 * Reader configuration
 *
 * Values shared by the progress controller, the viewport observer and the
 * slider. The slider range and the content range both end at `maxPage`
 * (the 52 Lord's Days of the catechism).
 */
export interface ReaderConfig {
  readonly maxPage: number;
  readonly minPage: number;
  readonly sliderDebounceMs: number;
  readonly intersectionThreshold: number;
  readonly rootMargin: string;
  readonly hysteresisPages: number;
  readonly basePath: string;
  readonly readerId: string;
  readonly resumeStorageKey: string;
  readonly debug: boolean;
}

export const readerConfig: ReaderConfig = Object.freeze({
  maxPage: 52,
  minPage: 1,
  sliderDebounceMs: 300,
  intersectionThreshold: 0.6,
  rootMargin: '20px',
  // Visibility reports within this many pages of the current position are ignored
  hysteresisPages: 1,
  basePath: '/heidelberg',
  readerId: 'heidelberg',
  resumeStorageKey: 'catechism-reader-resume',
  debug: process.env.NEXT_PUBLIC_READER_DEBUG === 'true'
});

export const MAX_PAGE = readerConfig.maxPage;
export const MIN_PAGE = readerConfig.minPage;
