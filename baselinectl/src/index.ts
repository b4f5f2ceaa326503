export type * from "./types/baseline.js";
export type * from "./types/changes.js";
export type * from "./types/interfaces.js";
export type * from "./types/impact.js";
export type * from "./types/compliance.js";
export type * from "./types/config.js";
export type * from "./types/report.js";
export type { Diagnostic } from "./types/diagnostic.js";

export * from "./errors.js";

export { diffBom } from "./diff/bom-differ.js";
export { diffGeometry, componentPath } from "./diff/geometry-differ.js";
export { diffTopology, reconcileHoles, compareEnvelope } from "./diff/topology-differ.js";
export { diffMetadata } from "./diff/metadata-differ.js";

export { inferInterfaces, classifyPair, alignHoles } from "./interfaces/inference.js";
export { analyzeInterfaces } from "./interfaces/analysis.js";
export { diffInterfaces, interfaceKey } from "./interfaces/interface-differ.js";

export { classifyImpact } from "./impact/classifier.js";
export { checkCompliance } from "./compliance/checker.js";
export { compareBaselines, type ComparisonOptions, type ComparisonResult } from "./compare/comparator.js";

export { loadBaseline, parseBaseline } from "./baseline/loader.js";
export { BaselineStore } from "./baseline/store.js";
export { CommandExtractionService, isModelFile, type GeometryExtractionService } from "./baseline/extraction.js";
export { computeSha256 } from "./baseline/checksum.js";

export { extractGeometry, extractBom, bomToCsv } from "./query/extract.js";
export { analyzeBaseline } from "./query/analyze.js";
export type { BaselineAnalysis, AnalyzeOptions } from "./query/analyze.js";
export { ReportWriter, buildReport } from "./report/writer.js";
export { SchemaRegistry, createRegistry } from "./schema/registry.js";
export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
