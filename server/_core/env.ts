import { z } from "zod";

const regenerationPolicy = z.enum(["version", "reject"]);

export const ENV = {
  databaseUrl: process.env.DATABASE_URL ?? "",
  isProduction: process.env.NODE_ENV === "production",
  defaultFactorSource: process.env.DEFAULT_FACTOR_SOURCE ?? "DEFRA",
  defaultCompanyCountry: process.env.DEFAULT_COMPANY_COUNTRY ?? "ES",
  reportRegenerationPolicy: regenerationPolicy.parse(process.env.REPORT_REGENERATION_POLICY ?? "version"),
  reportMethodology:
    process.env.REPORT_METHODOLOGY ??
    "Emissions calculated using IPCC/EEA/DEFRA emission factors. Scope 1: direct emissions. Scope 2: indirect emissions from purchased energy. Scope 3: other indirect emissions.",
};
