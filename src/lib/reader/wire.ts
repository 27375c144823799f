import { z } from 'zod';
import type { ScrollIntent, SectionId } from './types';

/**
 * Wire contract between the viewport observer and the progress controller.
 * Both directions use the `scrollto` event name.
 */
export const SCROLL_TO_EVENT = 'scrollto';

/** Client → controller: `{ position: "15" }` */
export const clientScrollToSchema = z.object({
  position: z.string().regex(/^\d+$/, 'position must be a page number')
});

export type ClientScrollToPayload = z.infer<typeof clientScrollToSchema>;

/** Controller → client: `{ page: "page_15" }` */
export interface ServerScrollToPayload {
  page: SectionId;
}

const SECTION_ID_PATTERN = /^page_(\d+)$/;

export function sectionIdForPage(page: number): SectionId {
  return `page_${page}`;
}

/**
 * Page number encoded in a section id, or null for anything else
 */
export function pageFromSectionId(id: string): number | null {
  const match = SECTION_ID_PATTERN.exec(id);
  if (!match) return null;
  return parseInt(match[1], 10);
}

export function encodeClientScrollTo(page: number): ClientScrollToPayload {
  return { position: String(page) };
}

export function encodeServerScrollTo(intent: Pick<ScrollIntent, 'sectionId'>): ServerScrollToPayload {
  return { page: intent.sectionId };
}

/**
 * Validate an incoming client payload.
 * Returns the page as a number, or null when the payload is malformed.
 */
export function decodeClientScrollTo(payload: unknown): number | null {
  const parsed = clientScrollToSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    console.warn(`[wire] Rejected ${SCROLL_TO_EVENT} payload:`, issue?.message ?? 'invalid payload');
    return null;
  }
  return parseInt(parsed.data.position, 10);
}
