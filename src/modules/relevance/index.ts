export * from './relevance.types.js';
export { RelevanceMapper, loadRelevanceTable } from './relevance.mapper.js';
