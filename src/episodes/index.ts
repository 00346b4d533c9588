export { analyzeChapters, hasMultiEpisodeChapters } from './chapters.js'
export type { ChapterAnalysis } from './chapters.js'
export { checkSourceFile } from './check.js'
export type { SourceCheck } from './check.js'
export { clusterDetections, pickBestCluster, rankClusters } from './cluster.js'
export {
  ConfigurationError,
  DegenerateInputError,
  NoDetectionError,
  OrderingViolationError,
  SplitError,
  TransientServiceError,
  describeError,
} from './errors.js'
export type { SplitErrorKind } from './errors.js'
export { ExtractionRefusedError, buildExtractArgs, extractEpisodes, resolveOutputPaths } from './extract.js'
export type { ExtractedEpisode } from './extract.js'
export { buildEpisodeFilename, parseEpisodeFilename } from './filename.js'
export { parseBoundaryPattern } from './pattern.js'
export { planEpisodeSplit } from './plan.js'
export type { PlanDependencies } from './plan.js'
export { resolveSplitSettings } from './settings.js'
export type { SettingsOverrides, SplitSettings } from './settings.js'
export { determineSearchWindows } from './windows.js'
export type * from './types.js'
