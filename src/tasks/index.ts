export { effectiveBatchSize, Task } from './base.js';
export { TextClassificationTask } from './classification.js';
export { RetrievalQuestionAnsweringTask } from './retrieval.js';
