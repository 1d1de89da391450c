export * from './resource.types.js';
export {
  ResourcePriorityParser,
  asRequiredAssets,
  normalizeResourceName,
  type ResourceParserOptions,
} from './resource.parser.js';
