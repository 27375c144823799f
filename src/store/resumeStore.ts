import { create } from 'zustand';
import { persist, createJSONStorage } from 'zustand/middleware';
import { z } from 'zod';
import { readerConfig } from '@/lib/reader/config';
import { clampPage } from '@/lib/reader/page';

/**
 * Last page seen in one reader
 */
export interface ResumePoint {
  page: number;
  savedAt: number;
}

type ResumeMap = Record<string, ResumePoint>;

interface ResumeState {
  resume: ResumeMap;
}

interface ResumeActions {
  /**
   * Remember the page the viewport settled on
   */
  recordPage: (readerId: string, page: number) => void;

  /**
   * Get the remembered page, re-validated and clamped, or null
   */
  getResumeHint: (readerId: string) => number | null;

  /**
   * Forget the remembered page for a reader
   */
  clear: (readerId: string) => void;
}

const resumePointSchema = z.object({
  page: z.number().int(),
  savedAt: z.number()
});

/**
 * Session-scoped resume cache.
 * A convenience hint only: the URL-derived position always wins over it.
 */
export const useResumeStore = create<ResumeState & ResumeActions>()(
  persist(
    (set, get) => ({
      resume: {},

      recordPage: (readerId: string, page: number) => {
        set((state) => ({
          resume: {
            ...state.resume,
            [readerId]: {
              page,
              savedAt: Date.now()
            }
          }
        }));
      },

      getResumeHint: (readerId: string) => {
        const parsed = resumePointSchema.safeParse(get().resume[readerId]);
        if (!parsed.success) return null;
        return clampPage(parsed.data.page);
      },

      clear: (readerId: string) => {
        set((state) => {
          const { [readerId]: _, ...rest } = state.resume;
          return { resume: rest };
        });
      }
    }),
    {
      name: readerConfig.resumeStorageKey,
      storage: createJSONStorage(() => sessionStorage),
      partialize: (state) => ({ resume: state.resume })
    }
  )
);
