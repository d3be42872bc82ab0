/** @entry formatters barrel export */
export {
  formatPortfolioAnalysis,
  formatDistribution,
  fmtMoney,
  fmtPercent,
  isReportSection,
  SECTIONS,
} from './terminalFormatter.js';
export type { ReportSection } from './terminalFormatter.js';
