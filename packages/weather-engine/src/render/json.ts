import type { Report } from "../report.js";

/** Indented JSON; non-ASCII text is written as is. */
export const renderJson = (report: Report): string => JSON.stringify(report, null, 2);
