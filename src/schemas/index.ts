// Config schemas
export {
  LogLevelSchema,
  ScanEnvSchema,
  type LogLevel,
  type ScanEnv,
} from './config.js';

// Export schemas
export {
  DeviceTypeSchema,
  ExportRowSchema,
  ExportDocumentSchema,
  type ExportRow,
  type ExportDocument,
} from './export.js';
