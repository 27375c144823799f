'use client';

import { memo, useEffect, useRef, useState } from 'react';
import { getPartForPage } from '@/lib/catechism';

interface PageIndicatorProps {
  currentPage: number;
  totalPages: number;
}

/**
 * Marginal Lord's Day marker.
 * Follows the slider value, so it moves as soon as the reader scrolls
 * into a new section.
 */
export const PageIndicator = memo(function PageIndicator({
  currentPage,
  totalPages
}: PageIndicatorProps) {
  const [isChanging, setIsChanging] = useState(false);
  const prevPage = useRef(currentPage);

  useEffect(() => {
    if (prevPage.current === currentPage) return;
    prevPage.current = currentPage;
    setIsChanging(true);
    const timer = setTimeout(() => setIsChanging(false), 400);
    return () => clearTimeout(timer);
  }, [currentPage]);

  const part = getPartForPage(currentPage);

  return (
    <aside
      className={`page-indicator ${isChanging ? 'changing' : ''}`}
      aria-label={`Lord's Day ${currentPage} of ${totalPages}`}
    >
      <span className="page-indicator-number">{currentPage}</span>
      {part && <span className="page-indicator-part">{part.title}</span>}
    </aside>
  );
});
