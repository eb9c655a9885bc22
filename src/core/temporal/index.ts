export {
  DATE_FORMAT,
  DEFAULT_DEADLINE_DAYS,
  defaultDeadline,
  formatDate,
  matchRelativeExpression,
  resolveDate
} from './resolver';
