export { analyzeRepository, type AnalysisPhase, type AnalyzeOptions } from './analysis/analyzer.js';
export { findDuplicates, type DuplicateEntry } from './analysis/duplicates.js';
export { attributeLayer, ClassificationEngine } from './classification/engine.js';
export { extractTestFunctions } from './classification/declarations.js';
export { compileRuleSet, defaultRulesPath, loadRuleSet, RuleSetSchema, type CompiledRuleSet, type RuleSetDocument } from './classification/rules.js';
export { LAYERS, type Classification, type ClassifiedFile, type Layer, type SourceFile, type TestFunction } from './classification/types.js';
export { resolveSettings, type AnalysisSettings } from './config/settings.js';
export { attributeProjectCoverage, runCoverage, type CoverageOptions } from './coverage/orchestrator.js';
export { parseCoverageReport, PARSERS, type CoverageReportParser, type ReportFormat } from './coverage/parsers/index.js';
export { ExecaToolRunner, type ToolInvocation, type ToolResult, type ToolRunner } from './coverage/process.js';
export { coverageRecord, type CoverageRecord, type CoverageTotals } from './coverage/record.js';
export { selectToolchains, TOOLCHAINS } from './coverage/toolchains/index.js';
export type { CoverageResult, CoverageRunOutcome, Toolchain, ToolchainContext, UnitResult } from './coverage/types.js';
export { discoverCandidates, discoverTestFiles, loadSourceFile } from './discovery/discover.js';
export { walkRepository, type WalkedFile } from './discovery/walker.js';
export { aggregate } from './report/aggregate.js';
export type { Report } from './report/types.js';
export { detectStack } from './stack/detector.js';
export { ECOSYSTEMS, type Ecosystem, type TechStack } from './stack/types.js';
export { Logger, type LoggerOptions, type LogLevel } from './utils/logger.js';
