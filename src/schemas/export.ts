import { z } from 'zod';

export const DeviceTypeSchema = z.enum(['ADB', 'SSH', 'Telnet', 'Unknown', 'Unreachable']);

// One exported probe result
export const ExportRowSchema = z.object({
  ip: z.string(),
  port: z.number().int().min(1).max(65535),
  device_type: DeviceTypeSchema,
  open: z.boolean(),
  elapsed_ms: z.number().int().nonnegative(),
  banner: z.string().nullable(),
});

export const ExportDocumentSchema = z.object({
  generated_at: z.string(),
  stats: z.object({
    scanned: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
    open: z.number().int().nonnegative(),
    elapsed_ms: z.number().int().nonnegative(),
  }),
  results: z.array(ExportRowSchema),
});

export type ExportRow = z.infer<typeof ExportRowSchema>;
export type ExportDocument = z.infer<typeof ExportDocumentSchema>;
