import partsData from '@/data/catechism-parts.json';
import type { ContentSection } from '@/lib/reader/types';
import { sectionIdForPage } from '@/lib/reader/wire';
import type { CatechismPart } from './types';

const PARTS: readonly CatechismPart[] = partsData;

/**
 * All content parts in page order
 */
export function getParts(): readonly CatechismPart[] {
  return PARTS;
}

/**
 * Find the part whose page range contains a page.
 *
 * @returns The part, or null if the page is outside every part
 */
export function getPartForPage(page: number): CatechismPart | null {
  return PARTS.find(part => page >= part.startPage && page <= part.endPage) ?? null;
}

/**
 * Sections rendered while the reader is on a page: every page of the part
 * that contains it.
 */
export function getRenderableSections(page: number): ContentSection[] {
  const part = getPartForPage(page);
  if (!part) return [];

  const sections: ContentSection[] = [];
  for (let p = part.startPage; p <= part.endPage; p++) {
    sections.push({ id: sectionIdForPage(p), page: p, partId: part.id });
  }
  return sections;
}

/**
 * Last page covered by any part
 */
export function getLastContentPage(): number {
  return PARTS.reduce((max, part) => Math.max(max, part.endPage), 0);
}
