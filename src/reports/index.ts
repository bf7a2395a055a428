export { buildSummaryReport, buildRecommendations, describeChange, describeReason } from "./summary.js";
export { writeReports, tryWriteReports, reporterContext } from "./writer.js";
export type { ReportOutcome, WriteReportsOptions, WrittenReports } from "./writer.js";
