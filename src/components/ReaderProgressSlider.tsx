'use client';

import { memo, useEffect, useMemo } from 'react';
import { readerConfig } from '@/lib/reader/config';
import { resolvePage } from '@/lib/reader/page';
import { createDebouncedForwarder } from '@/lib/utils/debounce';

interface ReaderProgressSliderProps {
  inputRef: React.RefObject<HTMLInputElement | null>;
  initialPage: number;
  /** Called with the settled page once input has been quiet for the debounce delay */
  onPageChange: (page: number) => void;
  /** Called on every input event, before debouncing */
  onInput?: (page: number) => void;
  maxPage?: number;
  debounceMs?: number;
}

/**
 * Reading-progress range control.
 *
 * Uncontrolled: the viewport observer writes its value directly while the
 * reader scrolls. Only settled drags are forwarded.
 */
export const ReaderProgressSlider = memo(function ReaderProgressSlider({
  inputRef,
  initialPage,
  onPageChange,
  onInput,
  maxPage = readerConfig.maxPage,
  debounceMs = readerConfig.sliderDebounceMs
}: ReaderProgressSliderProps) {
  const forwarder = useMemo(
    () => createDebouncedForwarder(onPageChange, debounceMs),
    [onPageChange, debounceMs]
  );

  useEffect(() => () => forwarder.cancel(), [forwarder]);

  return (
    <form
      className="reader-progress"
      onSubmit={(e) => e.preventDefault()}
    >
      <label htmlFor="reader_progress" className="reader-progress-label">
        Lord&apos;s Day
      </label>
      <input
        ref={inputRef}
        id="reader_progress"
        name="reader_progress"
        type="range"
        min="1"
        max={maxPage}
        step="1"
        defaultValue={initialPage}
        onChange={(e) => {
          const page = resolvePage(e.target.value, maxPage);
          onInput?.(page);
          forwarder.schedule(page);
        }}
        className="reader-progress-input"
      />
    </form>
  );
});
