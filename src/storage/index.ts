export { type TapeStore, emptyDocument, normalizeTapeName } from './base.js';
export { YamlFileTapeStore, TAPE_EXTENSION } from './yaml-file.adapter.js';
export { MemoryTapeStore } from './memory.adapter.js';
export {
  TAPE_TAG,
  parseTapeDocument,
  stringifyTapeDocument,
  serializeTape,
  deserializeTape,
} from './tape-codec.js';
