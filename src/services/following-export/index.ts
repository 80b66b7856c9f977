/**
 * Following Export Service
 *
 * Barrel export for the following list exporter.
 */

export { FollowingExportService, DEFAULT_PAGE_DELAY_MS } from './following-export-service.js';
export type {
  FollowingExportServiceDependencies,
  FollowingExportResult,
  ExportPageProgress,
} from './following-export-service.js';
