// Migration reporting
export { MigrationReporter } from './migration-reporter';
export type { MigrationRunInfo, MigrationSummary, ReportFiles, StageTotals } from './migration-reporter';
