// Progress lines, summary table and footer
export {
  formatProgressLine,
  formatOutcomeMessages,
  formatSummaryTable,
  formatFooter,
  styleFor,
} from "./sync-report.js";
