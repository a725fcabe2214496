export type { PaperDocument, PaperSection } from './paper-document.js';
export {
  paperDocumentSchema,
  parsePaperDocument,
  readPaperDocument,
  sectionText,
  sectionEntities,
  entityList,
} from './paper-document.js';

export type { LoadStep, LoadSummary, PaperGraphLoaderOptions } from './paper-loader.js';
export { PaperGraphLoader, splitModelName } from './paper-loader.js';
