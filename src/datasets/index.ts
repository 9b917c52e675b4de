export { Dataset } from './base.js';
export { loadContextStore } from './contexts.js';
export {
  type JsonlClassificationOptions,
  JsonlClassificationDataset,
  jsonlClassificationOptionsSchema,
  readJsonLines,
} from './jsonl.js';
export { type JsonlRagOptions, JsonlRagDataset, jsonlRagOptionsSchema } from './jsonl-rag.js';
