export {
  setColorsEnabled,
  bold,
  dim,
  red,
  green,
  yellow,
  cyan,
  gray,
  stageIcon,
  httpStatus,
} from './colors.js';

export {
  formatStatusEvent,
  formatStatusEventJson,
  createProgressPrinter,
} from './progress.js';

export {
  formatAuthStatus,
  formatSearchResult,
  formatMinutesReport,
  formatServerBanner,
} from './reporter.js';
