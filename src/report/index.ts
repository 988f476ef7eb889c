export { renderText, REPORT_TITLE } from "./text.js";
export { writeReport, reportFileName, ReportWriteError } from "./writer.js";
