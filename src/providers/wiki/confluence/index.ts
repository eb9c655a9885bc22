export {
  ConfluenceClient,
  type ConfluenceClientOptions,
  describeHtml,
  type ExistingPage,
  normalizeWikiBaseUrl,
  SNIPPET_LENGTH
} from './client';
export { buildMeetingPage, escapeHtml, type MeetingPageInput, type PageActionItem } from './page';
