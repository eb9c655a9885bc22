export * from './confluence';
export type { PublishedPage, Wiki, WikiResult } from './types';
