export { mapImportPath, importEntry } from './path-mapper.js';
export { runImport, walkFiles, skipReason } from './importer.js';
export type { ImportOptions, ImportResult } from './importer.js';
export { runUnimport } from './unimport.js';
