import { z } from 'zod';

// ============================================================================
// Errors
// ============================================================================

export const ErrorCodeSchema = z.enum([
  'NotFound',
  'PermissionDenied',
  'AlreadyExists',
  'IOFailure',
  'ConfigInvalid',
]);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

// ============================================================================
// Settings Schema (persisted by the rule store)
// ============================================================================

export const MonitorSettingsSchema = z.object({
  delayMs: z.number().int().nonnegative(), // settle time before a watched file is placed
});

export const SettingsSchema = z.object({
  fileTypes: z.record(z.string().min(1), z.array(z.string())),
  defaultCategory: z.string().min(1),
  organizeByDate: z.boolean(),
  dateFormat: z.string().min(1), // strftime subset, e.g. "%Y-%m"
  excludedExtensions: z.array(z.string()),
  excludedPatterns: z.array(z.string()), // exact names, "*" as wildcard
  minFileSize: z.number().int().nonnegative(), // 0 = no minimum
  maxFileSize: z.number().int().nonnegative(), // 0 = no maximum
  monitor: MonitorSettingsSchema,
});

export type Settings = z.infer<typeof SettingsSchema>;
export type MonitorSettings = z.infer<typeof MonitorSettingsSchema>;

export const SettingsSummarySchema = z.object({
  totalCategories: z.number(),
  totalExtensions: z.number(),
  organizeByDate: z.boolean(),
  defaultCategory: z.string(),
});

export type SettingsSummary = z.infer<typeof SettingsSummarySchema>;

// ============================================================================
// Placement Schemas
// ============================================================================

export const PlacementOutcomeSchema = z.enum(['moved', 'skipped', 'failed']);

export type PlacementOutcome = z.infer<typeof PlacementOutcomeSchema>;

export const PlacementResultSchema = z.object({
  source: z.string(),
  category: z.string(),
  targetDirectory: z.string(),
  targetPath: z.string(),
  outcome: PlacementOutcomeSchema,
  error: z
    .object({
      code: ErrorCodeSchema,
      message: z.string(),
    })
    .optional(),
});

export type PlacementResult = z.infer<typeof PlacementResultSchema>;

export const BatchSummarySchema = z.object({
  total: z.number(),
  success: z.number(),
  failed: z.number(),
  skipped: z.number(),
  results: z.array(PlacementResultSchema),
});

export type BatchSummary = z.infer<typeof BatchSummarySchema>;

// Dry-run row: where a file would go, nothing is touched
export const PreviewEntrySchema = z.object({
  sourcePath: z.string(),
  fileName: z.string(),
  category: z.string(),
  relativeDirectory: z.string(), // target directory relative to the target root
  sizeBytes: z.number(),
  extension: z.string(),
});

export type PreviewEntry = z.infer<typeof PreviewEntrySchema>;

export const DirectoryStatsSchema = z.object({
  totalFiles: z.number(),
  totalSize: z.number(),
  byExtension: z.record(z.number()), // '' key = files without an extension
  byCategory: z.record(z.number()),
});

export type DirectoryStats = z.infer<typeof DirectoryStatsSchema>;

// ============================================================================
// Audit Log Schemas (stored in DB)
// ============================================================================

export const OperationStatusSchema = z.enum(['success', 'failed', 'skipped']);

export type OperationStatus = z.infer<typeof OperationStatusSchema>;

export const OperationRecordSchema = z.object({
  id: z.number(),
  operation: z.string(),
  source: z.string(),
  target: z.string().nullable(),
  status: OperationStatusSchema,
  error: z.string().nullable(),
  created_at: z.number(), // Unix timestamp in ms
});

export type OperationRecord = z.infer<typeof OperationRecordSchema>;

export const OperationStatsSchema = z.object({
  total: z.number(),
  succeeded: z.number(),
  failed: z.number(),
  skipped: z.number(),
  byOperation: z.record(z.number()),
});

export type OperationStats = z.infer<typeof OperationStatsSchema>;
