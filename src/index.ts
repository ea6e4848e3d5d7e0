/**
 * stadata-x ライブラリのエントリポイント
 */

export { BpsClient, createBpsClient, DEFAULT_BASE_URL, type BpsClientOptions } from './lib/bps/client';
export type {
  DynamicDataRequest,
  DynamicTableMetadata,
  DynamicTableSummary,
  ListPage,
  MetadataItem,
  Region,
  RegionLevel,
  RegionType,
  StaticTable,
  TableListFilters,
  TableSummary,
} from './lib/bps/types';
export { ConfigStore, resolveConfigDir, type ConfigLoadResult, type ConfigStoreOptions } from './lib/config/store';
export {
  DEFAULT_CONFIG,
  EXPORT_FORMATS,
  NATIONAL_DOMAIN,
  migrateConfig,
  type AppConfig,
  type ExportFormat,
  type Preferences,
} from './lib/config/schema';
export { loadEnv, EnvironmentError } from './lib/config/env';
export * from './lib/errors';
export {
  DataExporter,
  exportTable,
  resolveExportPath,
  type ExportOptions,
  type ExportSummary,
} from './lib/export/exporter';
export { parseCsv, toCsv } from './lib/export/csv';
export {
  createTabularResult,
  type CellValue,
  type Column,
  type ColumnType,
  type Row,
  type TabularResult,
} from './lib/tabular/result';
export { createLogger, type Logger, type LogContext } from './lib/utils/logger';
