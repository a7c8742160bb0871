/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export {
  cycleSummaryItems,
  formatFailureLines,
  formatReportMarkdown,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  reportSummaryItems,
  TABLE_WIDTHS,
} from "./formatters";
// Output
export {
  banner,
  cancel,
  color,
  error,
  info,
  intro,
  message,
  NAME,
  note,
  outro,
  step,
  success,
  VERSION,
  warn,
} from "./output";

import * as output from "./output";

export const ui = {
  banner: output.banner,
  intro: output.intro,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  step: output.step,
  message: output.message,
};
