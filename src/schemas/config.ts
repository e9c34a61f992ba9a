import { z } from 'zod';

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

// Environment read by the command-line entry point
export const ScanEnvSchema = z.object({
  SCAN_START_IP: z.string().min(1),
  SCAN_END_IP: z.string().min(1).optional(),
  SCAN_PORTS: z.string().min(1).optional(),
  SCAN_THREADS: z.coerce.number().optional(),
  SCAN_TIMEOUT: z.coerce.number().optional(),
  SCAN_PROFILE: z.string().min(1).optional(),
  SCAN_ADB: BooleanFlagSchema.optional(),
  SCAN_SSH: BooleanFlagSchema.optional(),
  SCAN_TELNET: BooleanFlagSchema.optional(),
  SCAN_SKIP_PING: BooleanFlagSchema.optional(),
  SCAN_MAX_TARGETS: z.coerce.number().optional(),
  SCAN_EXPORT_JSON: z.string().min(1).optional(),
  SCAN_EXPORT_CSV: z.string().min(1).optional(),
  SCAN_EXPORT_ALL: BooleanFlagSchema.default('false'),
  SCAN_PROGRESS_INTERVAL: z.coerce.number().int().min(100).default(2000),
  LOG_LEVEL: LogLevelSchema.default('info'),
  SCAN_LOG_DIR: z.string().min(1).optional(),
});

export type ScanEnv = z.infer<typeof ScanEnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
