export * from './selector/index.js';
export { buildCommentTree } from './review/tree.js';
export { BrowseItemRenderer, formatRelativeTime } from './review/renderer.js';
export {
  formatBlockquote,
  formatDiffWithHeaders,
  formatQuotedReply,
  stripSuggestionBlock,
} from './review/quote.js';
export { createBrowseOptions, toggleResolved } from './review/actions.js';
export type { BrowseContext } from './review/actions.js';
export { GhReviewClient, GitHubError } from './review/client.js';
export type { ReviewClient, GhRunner } from './review/client.js';
export { openUrlInBrowser } from './review/browser.js';
export type { BrowseItem, ReviewComment, ReviewReply } from './review/types.js';
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { ReviewThreadsConfig } from './config.js';
export { Logger } from './logger.js';
export { VERSION } from './version.js';
