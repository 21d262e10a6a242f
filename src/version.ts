export const TOOL_NAME = 'entity-graph-codegen';
export const VERSION = '0.1.0';
