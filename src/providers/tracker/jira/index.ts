export { type AdfDocument, toAdfDocument } from './adf';
export {
  buildIssueFields,
  ISSUE_TYPE_FALLBACKS,
  JiraClient,
  type JiraClientOptions,
  type JiraIssueFields,
  jqlString,
  MAX_SUMMARY_LENGTH,
  normalizeSummary,
  selectIssueType
} from './client';
