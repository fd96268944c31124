export { RedditSource } from './reddit.js';
export type { RedditSourceOptions } from './reddit.js';
export type { DocumentSource, RawDocument } from './types.js';
