// Public library surface.

export { TOOL_NAME, VERSION } from './version';

export * from './declarations/declarationModel';
export * from './declarations/adapter';
export * from './declarations/annotations';
export * from './declarations/recordAdapter';
export * from './declarations/loadDeclarationsJson';
export * from './model/descriptors';
export * from './build/naming';
export * from './build/propertyExtractor';
export * from './build/entityBuilder';
export * from './graph/entityGraph';
export * from './graph/assembleGraph';
export * from './graph/serializeGraph';
export * from './validate/validateGraph';
export * from './report/diagnostics';
export * from './report/processingReport';
export * from './emit/artifactModel';
export * from './emit/deriveArtifacts';
export * from './emit/renderArtifacts';
export * from './emit/writeArtifacts';
export * from './config/processorConfig';
export * from './core/context';
export * from './core/processDeclarations';
export * from './core/processProject';
export * from './extract/ts/readDeclarations';
export * from './scan/sourceScanner';
export * from './util/logger';
export { stableStringify } from './util/deterministicJson';
