export {
  DocumentReadError,
  type DocumentName,
  type DocumentRepository,
} from './document-repository';

export { JsonFileDocumentRepository, DOCUMENT_FILES } from './json-file-repository';
