export {
  KnowledgeBaseErrorCode,
  KnowledgeBaseError,
  isKnowledgeBaseError,
  isTimeoutError,
  toKnowledgeBaseError,
} from './types.js';
