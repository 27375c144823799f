/**
 * A contiguous run of pages rendered together
 */
export interface CatechismPart {
  id: string;
  title: string;
  subtitle: string;
  startPage: number;
  endPage: number;
}
