export { getParts, getPartForPage, getRenderableSections, getLastContentPage } from './sections';
export type { CatechismPart } from './types';
