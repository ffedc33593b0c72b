export { DocumentEditor, listResourceFiles, RESOURCE_FILE_EXTENSIONS, type DocumentEditorOptions, type RemovalCriteria } from './editor.js';
export {
  parseResourceDocument,
  serializeResourceDocument,
  isContainerDocument,
  EMPTY_RESOURCES_DOCUMENT,
  type DocumentNode,
  type ElementNode,
  type ResourceDocument,
} from './model.js';
export { detachUnit, detachUnits, trimStart, type Detachment } from './surgery.js';
export { protectEscapeSequences, restoreEscapeSequences, ESCAPE_SEQUENCE_START_MARKER } from './escape.js';
