export type ValidationRule = "medal_count" | "missing_totals";

export interface ValidationWarning {
  severity: "warning";
  rule: ValidationRule;
  message: string;
  countryCode: string;
  details?: Record<string, unknown>;
}

export interface ValidationSummary {
  totalCountries: number;
  countriesWithWarnings: number;
  warningsByRule: Partial<Record<ValidationRule, number>>;
  allWarnings: ValidationWarning[];
}
