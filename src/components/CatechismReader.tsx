'use client';

import { useCallback, useMemo, useRef, useState } from 'react';
import { useStore } from 'zustand';
import { getPartForPage, getRenderableSections } from '@/lib/catechism';
import { parsePage, readerConfig } from '@/lib/reader';
import type { SliderMirror } from '@/lib/reader';
import { useProgressController } from '@/hooks/useProgressController';
import { useViewportObserver } from '@/hooks/useViewportObserver';
import { CatechismSection } from './CatechismSection';
import { PageIndicator } from './PageIndicator';
import { ReaderProgressSlider } from './ReaderProgressSlider';

interface CatechismReaderProps {
  /** Raw `page` query value as received by the server */
  requestedPage: string | null;
  /** Page the server resolved and rendered */
  initialPage: number;
}

export function CatechismReader({ requestedPage, initialPage }: CatechismReaderProps) {
  const contentRef = useRef<HTMLDivElement>(null);
  const sliderRef = useRef<HTMLInputElement>(null);

  const store = useProgressController(requestedPage);
  const position = useStore(store, state => state.position);
  const onSliderChange = useStore(store, state => state.onSliderChange);

  // Page shown by the slider; may run ahead of the controller while scrolling
  const [displayedPage, setDisplayedPage] = useState(initialPage);

  const slider = useMemo<SliderMirror>(() => ({
    getValue: () => parsePage(sliderRef.current?.value),
    setValue: (page) => {
      if (sliderRef.current) {
        sliderRef.current.value = String(page);
      }
      setDisplayedPage(page);
    }
  }), []);

  const part = getPartForPage(position);
  const sections = useMemo(
    () => (part ? getRenderableSections(part.startPage) : []),
    [part]
  );

  useViewportObserver({ store, contentRef, slider, sections });

  const handleSliderChange = useCallback((page: number) => {
    onSliderChange(page, 'slider');
  }, [onSliderChange]);

  return (
    <div className="catechism-reader">
      <header className="reader-toolbar">
        <ReaderProgressSlider
          inputRef={sliderRef}
          initialPage={initialPage}
          onPageChange={handleSliderChange}
          onInput={setDisplayedPage}
        />
      </header>

      <PageIndicator currentPage={displayedPage} totalPages={readerConfig.maxPage} />

      <main className="reader-main">
        {part && (
          <header className="part-header">
            <h2 className="part-title">{part.title}</h2>
            <p className="part-subtitle">{part.subtitle}</p>
          </header>
        )}
        <div ref={contentRef} id="content" className="reader-content">
          {sections.map(section => (
            <CatechismSection key={section.id} section={section} />
          ))}
        </div>
      </main>
    </div>
  );
}
