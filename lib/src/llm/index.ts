/**
 * LLM Module
 */

export * from './types.js';
export * from './errors.js';
export * from './adapter.js';
export * from './adapters/openai.js';
