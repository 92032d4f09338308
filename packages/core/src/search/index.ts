/**
 * Search module exports
 *
 * @module search
 */

export { extractContext, ELLIPSIS, DEFAULT_CONTEXT_CHARS } from './ContextExtractor';

export { highlightText, highlightsFor, hasMatch, mergeSpans } from './Highlighter';
export type { HighlightMarkers } from './Highlighter';

export { TaskSearchService } from './TaskSearchService';
export type { TaskSearchServiceOptions } from './TaskSearchService';
