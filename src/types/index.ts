/**
 * Barrel export for all shared types.
 */
export type { Paper } from './paper.js';
export type {
    AttributeValue,
    StoredItem,
    ItemType,
    PaperDetailItem,
    CategoryItem,
    AuthorItem,
    KeywordItem,
    DerivedItem,
    ProjectedItem,
} from './item.js';
export { DEFAULT_CONFIG, LOG_LEVELS } from './config.js';
export type { PaperdexConfig, LogLevel } from './config.js';
