export * from './types';
export * from './errors';
export { ChipCatalog, CatalogFileSchema, DEFAULT_CATALOG_PATH, getDefaultCatalog, rankCandidates } from './catalog';
export { DetectionEngine, DetectionEngineOptions } from './detection/engine';
export { DETECTION_STRATEGIES, DetectionStrategy, StrategyVerdict } from './detection/strategies';
export {
  HostProbes,
  DeviceTreeProbe,
  PropertyProbe,
  KernelLogProbe,
  FirmwareDirectoryProbe,
  PlatformProperties,
  FirmwareListing,
  createHostProbes
} from './probes';
export { SourceAcquirer, AcquisitionStrategy } from './acquisition/source-acquirer';
export { BridgeAcquirer } from './acquisition/bridge-acquirer';
export { FilesystemAcquirer } from './acquisition/filesystem-acquirer';
export { ImageAcquirer } from './acquisition/image-acquirer';
export { StructureScaffolder, renderDefinitionsTemplate, renderMakefile } from './scaffold';
export { runExtraction, selectBinary, PipelineDeps } from './pipeline';
export { renderDetectionReport, buildReportData, ReportFormat } from './report';
export { safeExec, SafeExecResult, ExecFn } from './safe-exec';
