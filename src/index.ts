// Public library surface.

export const VERSION = '0.1.0';

export * from './spec/optionSpec';
export * from './spec/specTable';
export * from './spec/optstring';
export * from './spec/loadSpecFile';
export * from './parse/parsedArgs';
export * from './parse/parseArgs';
export * from './parse/accessors';
export * from './report/deterministicJson';
export * from './report/serializeParsedArgs';
export * from './report/shellOutput';
export * from './report/diagnostics';
export * from './report/markdownReport';
export * from './report/writeReport';
