/**
 * Domain error values. These travel inside neverthrow Results; none of them
 * is thrown.
 */

export interface InvalidRecordData {
  type: "InvalidRecordData";
  message: string;
  field: string | null;
}

export interface UnresolvedFactor {
  type: "UnresolvedFactor";
  message: string;
  category: string;
  unit: string;
}

export interface NoDataForPeriod {
  type: "NoDataForPeriod";
  message: string;
  companyId: number;
  year: number;
}

export interface ReportAlreadyExists {
  type: "ReportAlreadyExists";
  message: string;
  companyId: number;
  year: number;
  existingReportId: number;
}

export type BuildReportError = NoDataForPeriod | ReportAlreadyExists;

export const invalidRecordData = (message: string, field: string | null = null): InvalidRecordData => ({
  type: "InvalidRecordData",
  message,
  field,
});

export const unresolvedFactor = (category: string, unit: string): UnresolvedFactor => ({
  type: "UnresolvedFactor",
  message: `No emission factor found for ${category} (${unit})`,
  category,
  unit,
});

export const noDataForPeriod = (companyId: number, year: number): NoDataForPeriod => ({
  type: "NoDataForPeriod",
  message: `No emission data found for year ${year}`,
  companyId,
  year,
});

export const reportAlreadyExists = (companyId: number, year: number, existingReportId: number): ReportAlreadyExists => ({
  type: "ReportAlreadyExists",
  message: `A report for ${year} already exists (ID: ${existingReportId})`,
  companyId,
  year,
  existingReportId,
});
