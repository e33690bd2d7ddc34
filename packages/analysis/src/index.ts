/**
 * @fileoverview Offline analysis of recorded motion sessions and recording batches.
 */

export {
  type AnalyzeDatasetOptions,
  type AttemptResult,
  analyzeDataset,
  type DatasetResults,
  renderDatasetReport,
} from './DatasetReport.js';
export {
  catalogCategories,
  createManifest,
  formatSessionDate,
  type GestureCatalog,
  gestureNameFromPath,
  groupRecordingsByGesture,
  loadGestureCatalog,
  loadManifest,
  MANIFEST_FILE_NAME,
  MalformedManifestError,
  parseManifest,
  type RecordingManifest,
  serializeManifest,
  writeManifest,
} from './manifest.js';
export {
  assessQuality,
  isRecordable,
  type QualityAssessment,
  type QualityBand,
  qualityBand,
  qualityScore,
  type RecordingTiming,
} from './quality.js';
export {
  compareRecordings,
  extractTrajectory,
  type PrimitiveSegment,
  type PrimitiveShare,
  primitiveTimeline,
  type RecordingComparison,
  type RecordingOverview,
  type RecordingSummary,
  type SeriesStats,
  summarizeRecording,
  type VelocitySummary,
} from './RecordingAnalyzer.js';
